import type { MessageRole } from "@staff-desk/contracts";
import type { DbClient } from "../lib/db.js";
import { newId } from "../lib/db.js";

export interface MessageRef {
  id: string;
  conversationId: string;
  messageId: string;
  role: MessageRole;
  applicationId: string | null;
  createdAt: string;
}

export interface NewMessageRef {
  conversationId: string;
  messageId: string;
  role: MessageRole;
  applicationId: string | null;
}

export interface MessageRefRepo {
  add(ref: NewMessageRef): Promise<MessageRef>;
  list(conversationId: string, roles?: readonly MessageRole[]): Promise<MessageRef[]>;
  findByApplication(applicationId: string, role: MessageRole): Promise<MessageRef | null>;
  remove(ids: readonly string[]): Promise<void>;
}

const ROLES: readonly MessageRole[] = ["question-prompt", "summary", "result", "staff-review-card"];

function parseRole(value: unknown): MessageRole {
  const role = ROLES.find((item) => item === value);
  if (!role) {
    throw new Error(`unknown message role: ${String(value)}`);
  }
  return role;
}

function mapRow(row: Record<string, unknown>): MessageRef {
  return {
    id: String(row.id),
    conversationId: String(row.conversation_id),
    messageId: String(row.message_id),
    role: parseRole(row.role),
    applicationId: row.application_id === null || row.application_id === undefined ? null : String(row.application_id),
    createdAt: new Date(String(row.created_at)).toISOString(),
  };
}

export class PgMessageRefRepo implements MessageRefRepo {
  public constructor(private readonly db: DbClient) {}

  public async add(ref: NewMessageRef): Promise<MessageRef> {
    const result = await this.db.query<Record<string, unknown>>(
      `insert into message_refs (id, conversation_id, message_id, role, application_id, created_at)
       values ($1, $2, $3, $4, $5, $6)
       returning *`,
      [newId(), ref.conversationId, ref.messageId, ref.role, ref.applicationId, new Date()],
    );

    return mapRow(result.rows[0]);
  }

  public async list(conversationId: string, roles: readonly MessageRole[] = ROLES): Promise<MessageRef[]> {
    const result = await this.db.query<Record<string, unknown>>(
      `select *
       from message_refs
       where conversation_id = $1
         and role = any($2::text[])
       order by created_at asc`,
      [conversationId, [...roles]],
    );

    return result.rows.map(mapRow);
  }

  public async findByApplication(applicationId: string, role: MessageRole): Promise<MessageRef | null> {
    const result = await this.db.query<Record<string, unknown>>(
      `select *
       from message_refs
       where application_id = $1
         and role = $2
       order by created_at desc
       limit 1`,
      [applicationId, role],
    );

    if (result.rowCount !== 1) {
      return null;
    }

    return mapRow(result.rows[0]);
  }

  public async remove(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    await this.db.query(
      `delete from message_refs
       where id = any($1::text[])`,
      [[...ids]],
    );
  }
}
