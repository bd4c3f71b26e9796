export { validate, type ValidateOptions, type ValidationResult } from './overlap-validator.js';
