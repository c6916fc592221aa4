export { GraphClient, GraphRequestError } from "./graph-client.js";
export { GraphMailSource } from "./source.js";
export type { MailGraph, MailSource, MailSourceOptions, RecordsOptions } from "./source.js";
export { TenantConfigStore, tenantFromEnv } from "./config-store.js";
export type { RedactedTenant } from "./config-store.js";
export { TenantConfigSchema } from "./types.js";
export type {
  TenantConfig,
  TenantConfigInput,
  TenantConnectionTest,
  GraphMailMessage,
  GraphAttachment,
  GraphUser,
} from "./types.js";
