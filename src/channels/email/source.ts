import { errorMessage } from "../../errors.js";
import { pickIdentity } from "../../types.js";
import type { ItemIdentity, ItemMetadata, ItemRef, SourceRecord } from "../../types.js";
import { GraphClient } from "./graph-client.js";
import type { GraphAttachment, GraphMailMessage, GraphUser, TenantConfig } from "./types.js";

export interface MailSourceOptions {
  /** Caps the messages listed per mailbox; null lists everything. */
  mailsPerUser?: number | null;
  downloadAttachments?: boolean;
}

export interface RecordsOptions {
  /** Decides per listed item whether its bytes must be downloaded; default is always. */
  shouldFetch?: (ref: ItemRef) => boolean;
  signal?: AbortSignal;
}

/** Anything the ingestion pipeline can pull records for one tenant from. */
export interface MailSource {
  readonly tenantId: string;
  /** True when every item of the tenant, of every kind, is listed, so absent items are deletions. */
  readonly completeListing: boolean;
  records(options?: RecordsOptions): AsyncIterable<SourceRecord>;
}

/** Graph-backed client surface the source needs; lets tests substitute a fake. */
export type MailGraph = Pick<
  GraphClient,
  "listUsers" | "hasMailbox" | "listMessages" | "getMimeContent" | "listAttachments" | "getAttachment"
>;

/**
 * Lists every mailbox of a tenant and yields one record per message and per
 * attachment. A failed download yields a `failed` record; a failed listing
 * throws, because an incomplete listing cannot be told apart from deletions.
 */
export class GraphMailSource implements MailSource {
  readonly tenantId: string;
  private readonly graph: MailGraph;
  private readonly mailsPerUser: number | null;
  private readonly downloadAttachments: boolean;

  constructor(tenant: TenantConfig, options: MailSourceOptions = {}, graph?: MailGraph) {
    this.tenantId = tenant.tenantId;
    this.graph = graph ?? new GraphClient(tenant);
    this.mailsPerUser = tenant.mailsPerUser ?? options.mailsPerUser ?? null;
    this.downloadAttachments = tenant.downloadAttachments ?? options.downloadAttachments ?? true;
  }

  /** Without attachment downloads no attachment is listed, so their absence proves nothing. */
  get completeListing(): boolean {
    return this.mailsPerUser === null && this.downloadAttachments;
  }

  async *records(options: RecordsOptions = {}): AsyncGenerator<SourceRecord> {
    const shouldFetch = options.shouldFetch ?? (() => true);

    for await (const user of this.graph.listUsers()) {
      if (options.signal?.aborted) return;
      if (!(await this.graph.hasMailbox(user.id))) {
        console.log(`[graph-source] ${user.userPrincipalName} has no mailbox, skipping`);
        continue;
      }

      let count = 0;
      for await (const message of this.graph.listMessages(user.id, this.mailsPerUser)) {
        if (options.signal?.aborted) return;
        yield await this.messageRecord(user, message, shouldFetch);
        count++;

        if (this.downloadAttachments && message.hasAttachments) {
          yield* this.attachmentRecords(user, message, shouldFetch);
        }
      }
      console.log(`[graph-source] ${user.userPrincipalName}: ${count} message(s) listed`);
    }
  }

  private async messageRecord(
    user: GraphUser,
    message: GraphMailMessage,
    shouldFetch: (ref: ItemRef) => boolean,
  ): Promise<SourceRecord> {
    const ref: ItemRef = {
      ...this.identity(user, message.id, "message"),
      providerModifiedAt: parseDate(message.lastModifiedDateTime),
    };
    if (!shouldFetch(ref)) return { ...ref, status: "unchanged" };

    try {
      const bytes = await this.graph.getMimeContent(user.id, message.id);
      return { ...ref, status: "fetched", bytes, metadata: messageMetadata(message) };
    } catch (err) {
      return { ...pickIdentity(ref), status: "failed", error: `Message download failed: ${errorMessage(err)}` };
    }
  }

  private async *attachmentRecords(
    user: GraphUser,
    message: GraphMailMessage,
    shouldFetch: (ref: ItemRef) => boolean,
  ): AsyncGenerator<SourceRecord> {
    for (const att of await this.graph.listAttachments(user.id, message.id)) {
      const ref: ItemRef = {
        ...this.identity(user, `${message.id}/${att.id}`, "attachment"),
        providerModifiedAt: parseDate(att.lastModifiedDateTime) ?? parseDate(message.lastModifiedDateTime),
      };
      if (!shouldFetch(ref)) {
        yield { ...ref, status: "unchanged" };
        continue;
      }

      try {
        const full = await this.graph.getAttachment(user.id, message.id, att.id);
        if (!full) {
          yield { ...pickIdentity(ref), status: "failed", error: "Attachment disappeared during download" };
          continue;
        }
        yield { ...ref, status: "fetched", bytes: attachmentBytes(full), metadata: attachmentMetadata(full, message.id) };
      } catch (err) {
        yield { ...pickIdentity(ref), status: "failed", error: `Attachment download failed: ${errorMessage(err)}` };
      }
    }
  }

  private identity(user: GraphUser, itemId: string, kind: ItemIdentity["kind"]): ItemIdentity {
    return { tenantId: this.tenantId, mailboxId: user.userPrincipalName, itemId, kind };
  }
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** File attachments carry their bytes; item and reference attachments are kept as their JSON description. */
function attachmentBytes(att: GraphAttachment): Buffer {
  if (att.contentBytes !== undefined) {
    return Buffer.from(att.contentBytes, "base64");
  }
  return Buffer.from(JSON.stringify(att), "utf-8");
}

function messageMetadata(message: GraphMailMessage): ItemMetadata {
  return {
    subject: message.subject,
    from: message.from?.emailAddress.address ?? null,
    receivedAt: message.receivedDateTime,
    internetMessageId: message.internetMessageId ?? null,
    hasAttachments: message.hasAttachments,
  };
}

function attachmentMetadata(att: GraphAttachment, messageId: string): ItemMetadata {
  return {
    name: att.name,
    contentType: att.contentType,
    odataType: att["@odata.type"],
    messageId,
    isInline: att.isInline ?? false,
  };
}
