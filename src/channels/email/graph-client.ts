import { ConfidentialClientApplication } from "@azure/msal-node";
import { sleep } from "../../utils/retry.js";
import type {
  GraphAttachment,
  GraphMailMessage,
  GraphPage,
  GraphUser,
  TenantConfig,
  TenantConnectionTest,
} from "./types.js";

const GRAPH_BASE = "https://graph.microsoft.com/v1.0";
const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
const MESSAGE_FIELDS = "id,subject,from,receivedDateTime,lastModifiedDateTime,hasAttachments,internetMessageId";
const ATTACHMENT_FIELDS = "id,name,contentType,size,lastModifiedDateTime,isInline";

export class GraphRequestError extends Error {
  readonly status: number;

  constructor(method: string, status: number, body: string) {
    super(`Graph ${method} ${status}: ${body}`);
    this.name = "GraphRequestError";
    this.status = status;
  }
}

export interface GraphClientOptions {
  /** Retries after 429/503 responses before giving up (default: 4). */
  maxThrottleRetries?: number;
  /** Wait used when the response carries no Retry-After header (default: 5s). */
  defaultRetryAfterMs?: number;
}

/**
 * Read-only Microsoft Graph client for one tenant.
 * Uses Application Permissions (client_credentials flow); no browser login needed.
 * Requires Azure AD admin consent for User.Read.All and Mail.Read.
 */
export class GraphClient {
  private readonly msalApp: ConfidentialClientApplication;
  private readonly maxThrottleRetries: number;
  private readonly defaultRetryAfterMs: number;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;

  constructor(tenant: Pick<TenantConfig, "tenantId" | "clientId" | "clientSecret">, options: GraphClientOptions = {}) {
    this.msalApp = new ConfidentialClientApplication({
      auth: {
        clientId: tenant.clientId,
        authority: `https://login.microsoftonline.com/${tenant.tenantId}`,
        clientSecret: tenant.clientSecret,
      },
    });
    this.maxThrottleRetries = options.maxThrottleRetries ?? 4;
    this.defaultRetryAfterMs = options.defaultRetryAfterMs ?? 5_000;
  }

  // ---------- Authentication ----------

  private async getToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.tokenExpiresAt - 60_000) {
      return this.accessToken;
    }

    const result = await this.msalApp.acquireTokenByClientCredential({
      scopes: [GRAPH_SCOPE],
    });

    if (!result?.accessToken) {
      throw new Error("Failed to acquire Microsoft Graph access token");
    }

    this.accessToken = result.accessToken;
    this.tokenExpiresAt = result.expiresOn?.getTime() ?? Date.now() + 3600_000;
    return this.accessToken;
  }

  // ---------- Connection Test ----------

  async testConnection(): Promise<TenantConnectionTest> {
    try {
      const page = await this.graphGet<GraphPage<GraphUser>>("/users?$select=id&$top=1");
      return { success: true, userCount: page?.value.length ?? 0 };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (msg.includes("AADSTS")) {
        return { success: false, error: `Azure AD error: ${extractAadError(msg)}` };
      }
      return { success: false, error: msg };
    }
  }

  // ---------- Users ----------

  async *listUsers(): AsyncGenerator<GraphUser> {
    yield* this.paginate<GraphUser>("/users?$select=id,displayName,mail,userPrincipalName&$top=100");
  }

  async hasMailbox(userId: string): Promise<boolean> {
    const inbox = await this.graphGet<{ id: string }>(`/users/${enc(userId)}/mailFolders/Inbox?$select=id`);
    return inbox !== null;
  }

  // ---------- Messages ----------

  /** Newest first; stops after `limit` messages when given. */
  async *listMessages(userId: string, limit?: number | null): AsyncGenerator<GraphMailMessage> {
    const top = limit ? Math.min(limit, 100) : 100;
    let count = 0;
    for await (const msg of this.paginate<GraphMailMessage>(
      `/users/${enc(userId)}/messages?$select=${MESSAGE_FIELDS}&$orderby=receivedDateTime desc&$top=${top}`,
    )) {
      yield msg;
      count++;
      if (limit && count >= limit) return;
    }
  }

  /** Raw RFC 822 content of a message. */
  async getMimeContent(userId: string, messageId: string): Promise<Buffer> {
    return this.graphGetBytes(`/users/${enc(userId)}/messages/${enc(messageId)}/$value`);
  }

  /** Attachment metadata, without content. */
  async listAttachments(userId: string, messageId: string): Promise<GraphAttachment[]> {
    const attachments: GraphAttachment[] = [];
    for await (const att of this.paginate<GraphAttachment>(
      `/users/${enc(userId)}/messages/${enc(messageId)}/attachments?$select=${ATTACHMENT_FIELDS}`,
    )) {
      attachments.push(att);
    }
    return attachments;
  }

  async getAttachment(userId: string, messageId: string, attachmentId: string): Promise<GraphAttachment | null> {
    return this.graphGet<GraphAttachment>(
      `/users/${enc(userId)}/messages/${enc(messageId)}/attachments/${enc(attachmentId)}`,
    );
  }

  // ---------- Graph HTTP ----------

  private async *paginate<T>(path: string): AsyncGenerator<T> {
    let nextLink: string | null = path;
    while (nextLink) {
      const page: GraphPage<T> | null = await this.graphGet<GraphPage<T>>(nextLink);
      if (!page) return;
      yield* page.value ?? [];
      nextLink = page["@odata.nextLink"] ?? null;
    }
  }

  private async graphGet<T>(urlOrPath: string): Promise<T | null> {
    const res = await this.request(urlOrPath);
    if (res.status === 404) return null;
    return res.json() as Promise<T>;
  }

  private async graphGetBytes(urlOrPath: string): Promise<Buffer> {
    const res = await this.request(urlOrPath);
    if (res.status === 404) {
      throw new GraphRequestError("GET", 404, await res.text());
    }
    return Buffer.from(await res.arrayBuffer());
  }

  /** GET with throttling backoff. Returns 2xx and 404 responses; throws on anything else. */
  private async request(urlOrPath: string): Promise<Response> {
    const url = urlOrPath.startsWith("http") ? urlOrPath : `${GRAPH_BASE}${urlOrPath}`;

    for (let attempt = 0; ; attempt++) {
      const token = await this.getToken();
      const res = await fetch(url, {
        headers: { Authorization: `Bearer ${token}` },
      });

      if (res.ok || res.status === 404) return res;

      if ((res.status === 429 || res.status === 503) && attempt < this.maxThrottleRetries) {
        const waitMs = retryAfterMs(res.headers.get("Retry-After")) ?? this.defaultRetryAfterMs;
        console.warn(`[graph] Throttled (${res.status}), retrying in ${waitMs}ms`);
        await sleep(waitMs);
        continue;
      }

      throw new GraphRequestError("GET", res.status, await res.text());
    }
  }
}

function enc(value: string): string {
  return encodeURIComponent(value);
}

function retryAfterMs(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function extractAadError(msg: string): string {
  const match = msg.match(/AADSTS\d+:\s*(.+?)(?:\r?\n|$)/);
  return match?.[1] ?? msg;
}
