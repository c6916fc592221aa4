import fs from "fs";
import path from "path";
import crypto from "crypto";
import { NotFoundError } from "../../errors.js";
import { TenantConfigSchema, TenantRegistrySchema } from "./types.js";
import type { TenantConfig, TenantConfigInput } from "./types.js";

const CONFIG_FILE = "tenants.enc.json";

export type RedactedTenant = Omit<TenantConfig, "clientSecret"> & { clientSecret: string };

/**
 * Encrypted registry of the Microsoft 365 tenants to back up.
 * Uses AES-256-GCM with a key derived from a machine-local secret.
 * Stored in <dataDir>/tenants.enc.json.
 */
export class TenantConfigStore {
  private readonly configPath: string;
  private readonly encryptionKey: Buffer;

  constructor(dataDir: string) {
    this.configPath = path.join(dataDir, CONFIG_FILE);
    this.encryptionKey = this.deriveKey(path.resolve(dataDir));
  }

  hasConfig(): boolean {
    return fs.existsSync(this.configPath);
  }

  list(): TenantConfig[] {
    if (!this.hasConfig()) return [];

    const encrypted = fs.readFileSync(this.configPath, "utf-8");
    const parsed = TenantRegistrySchema.safeParse(JSON.parse(this.decrypt(encrypted)));
    if (!parsed.success) {
      throw new Error(`Tenant registry ${this.configPath} is invalid: ${parsed.error.message}`);
    }
    return parsed.data.tenants;
  }

  listActive(): TenantConfig[] {
    return this.list().filter((t) => t.active);
  }

  get(tenantId: string): TenantConfig {
    const tenant = this.list().find((t) => t.tenantId === tenantId);
    if (!tenant) throw new NotFoundError(`Unknown tenant: ${tenantId}`);
    return tenant;
  }

  /** Adds the tenant, or replaces the one with the same tenant id. */
  upsert(input: TenantConfigInput): TenantConfig {
    const tenant = TenantConfigSchema.parse(input);
    const tenants = this.list().filter((t) => t.tenantId !== tenant.tenantId);
    tenants.push(tenant);
    this.save(tenants);
    return tenant;
  }

  /** Deactivates the tenant. Its backed-up data stays in the index. */
  deactivate(tenantId: string): void {
    const tenants = this.list();
    const tenant = tenants.find((t) => t.tenantId === tenantId);
    if (!tenant) throw new NotFoundError(`Unknown tenant: ${tenantId}`);
    tenant.active = false;
    this.save(tenants);
  }

  /** Client secrets are masked. */
  listRedacted(): RedactedTenant[] {
    return this.list().map((t) => ({
      ...t,
      clientSecret: "••••••••" + t.clientSecret.slice(-4),
    }));
  }

  private save(tenants: TenantConfig[]): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, this.encrypt(JSON.stringify({ tenants })));
  }

  // ---------- Encryption ----------

  private encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv("aes-256-gcm", this.encryptionKey, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
    const tag = cipher.getAuthTag();

    return JSON.stringify({
      iv: iv.toString("hex"),
      tag: tag.toString("hex"),
      data: encrypted.toString("hex"),
    });
  }

  private decrypt(ciphertext: string): string {
    const { iv, tag, data } = JSON.parse(ciphertext) as { iv: string; tag: string; data: string };
    const decipher = crypto.createDecipheriv(
      "aes-256-gcm",
      this.encryptionKey,
      Buffer.from(iv, "hex"),
    );
    decipher.setAuthTag(Buffer.from(tag, "hex"));
    return decipher.update(Buffer.from(data, "hex")) + decipher.final("utf-8");
  }

  /**
   * Protects against accidental exposure of the data directory,
   * not against someone with access to this machine.
   */
  private deriveKey(dataDir: string): Buffer {
    const seed = `mailvault-tenants-${dataDir}-${process.env["USER"] ?? "default"}`;
    return crypto.scryptSync(seed, "mailvault-salt-v1", 32);
  }
}

/**
 * Builds a single tenant from TENANT_ID / CLIENT_ID / CLIENT_SECRET, for
 * setups that keep credentials in the environment instead of the registry.
 */
export function tenantFromEnv(env: NodeJS.ProcessEnv = process.env): TenantConfig | null {
  const tenantId = env["TENANT_ID"];
  const clientId = env["CLIENT_ID"];
  const clientSecret = env["CLIENT_SECRET"];
  if (!tenantId || !clientId || !clientSecret) return null;

  return TenantConfigSchema.parse({
    name: env["TENANT_NAME"] ?? tenantId,
    tenantId,
    clientId,
    clientSecret,
  });
}
