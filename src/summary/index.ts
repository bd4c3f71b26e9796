export { SummaryPublisher, type PublishResult, type SummaryPublisherConfig } from './summary-publisher.js';
