import { Type, type Static } from '@sinclair/typebox';

/** `2h`, `90m`, `1h30m`, `14d`, or milliseconds */
const Duration = Type.Union([Type.String({ minLength: 1 }), Type.Integer({ minimum: 0 })]);

const RoleList = Type.Array(Type.String({ minLength: 1 }), { default: [] });

export const CategorySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  scopeId: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  minSpacing: Duration,
  maxAdvance: Duration,
  reminderLead: Type.Optional(Duration),
  viewerRoles: Type.Optional(RoleList),
  creatorRoles: Type.Optional(RoleList),
  managerRoles: Type.Optional(RoleList),
  /** Role ids, or `everyone` */
  pingRoles: Type.Optional(RoleList),
  destinations: Type.Array(Type.String({ minLength: 1 })),
  pingGroup: Type.Optional(Type.String({ minLength: 1 })),
});

export const PingGroupSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  scopeId: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  cooldown: Duration,
});

export const SummarySchema = Type.Object({
  channel: Type.String({ minLength: 1 }),
  scopeId: Type.String({ minLength: 1 }),
  roles: Type.Optional(RoleList),
});

export const FleetboardConfigSchema = Type.Object({
  dataDir: Type.Optional(Type.String({ minLength: 1 })),
  tickInterval: Type.Optional(Duration),
  summaryInterval: Type.Optional(Duration),
  appUrl: Type.Optional(Type.String()),
  discord: Type.Optional(
    Type.Object({
      botToken: Type.Optional(Type.String()),
      apiBase: Type.Optional(Type.String()),
    }),
  ),
  delivery: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1, maximum: 50 })),
      backoffBase: Type.Optional(Duration),
      backoffMax: Type.Optional(Duration),
    }),
  ),
  audit: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      path: Type.Optional(Type.String({ minLength: 1 })),
    }),
  ),
  pingGroups: Type.Optional(Type.Array(PingGroupSchema)),
  categories: Type.Array(CategorySchema),
  summaries: Type.Optional(Type.Array(SummarySchema)),
});

export type RawFleetboardConfig = Static<typeof FleetboardConfigSchema>;
export type RawCategory = Static<typeof CategorySchema>;
