/**
 * Types for the Microsoft 365 mail source.
 * Uses Microsoft Graph API with Application Permissions (client_credentials).
 */
import { z } from "zod";

export const TenantConfigSchema = z.object({
  /** Display name, e.g. "Contoso" */
  name: z.string().min(1),
  /** Azure AD directory (tenant) id; also the tenant id used in the index */
  tenantId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  active: z.boolean().default(true),
  /** Caps the messages fetched per mailbox; unset means all */
  mailsPerUser: z.number().int().positive().optional(),
  downloadAttachments: z.boolean().optional(),
});

export type TenantConfig = z.infer<typeof TenantConfigSchema>;
export type TenantConfigInput = z.input<typeof TenantConfigSchema>;

export const TenantRegistrySchema = z.object({
  tenants: z.array(TenantConfigSchema),
});

export interface TenantConnectionTest {
  success: boolean;
  userCount?: number;
  error?: string;
}

export interface GraphUser {
  id: string;
  displayName: string | null;
  mail: string | null;
  userPrincipalName: string;
}

export interface GraphMailMessage {
  id: string;
  subject: string | null;
  from?: { emailAddress: { name: string; address: string } };
  receivedDateTime: string;
  lastModifiedDateTime: string;
  hasAttachments: boolean;
  internetMessageId?: string;
}

export interface GraphAttachment {
  "@odata.type": string;
  id: string;
  name: string | null;
  contentType: string | null;
  size: number;
  lastModifiedDateTime: string | null;
  isInline?: boolean;
  /** Base64, only present on file attachments fetched individually */
  contentBytes?: string;
}

export interface GraphPage<T> {
  value: T[];
  "@odata.nextLink"?: string;
}
