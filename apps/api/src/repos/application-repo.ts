import type { SqlExecutor, SqlPool, SqlSession } from "../lib/db.js";
import { isUniqueViolation, newApplicationId } from "../lib/db.js";
import { WorkflowError } from "../lib/errors.js";
import {
  assertCanAppend,
  assertCanClaim,
  assertCanDecide,
  assertCanScore,
  assertCanSubmit,
  parseDecision,
  parseStatus,
  type AnswerRecord,
  type ApplicationRecord,
  type Decision,
} from "../lib/application-rules.js";

export interface CreateApplicationInput {
  applicantId: string;
  applicantName?: string | null;
}

export interface ApplicationRepo {
  create(input: CreateApplicationInput): Promise<ApplicationRecord>;
  appendAnswer(id: string, index: number, questionText: string, text: string): Promise<ApplicationRecord>;
  submit(id: string, expectedAnswers: number): Promise<ApplicationRecord>;
  claim(id: string, reviewerId: string): Promise<ApplicationRecord>;
  setScore(id: string, reviewerId: string, value: number, scale: number): Promise<ApplicationRecord>;
  decide(id: string, reviewerId: string, decision: Decision, reason: string): Promise<ApplicationRecord>;
  findById(id: string): Promise<ApplicationRecord | null>;
  findByApplicant(applicantId: string): Promise<ApplicationRecord | null>;
}

type Row = Record<string, unknown>;

function toIso(value: unknown): string {
  return value instanceof Date ? value.toISOString() : new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  return value === null || value === undefined ? null : toIso(value);
}

function toStringOrNull(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toNumberOrNull(value: unknown): number | null {
  return value === null || value === undefined ? null : Number(value);
}

function mapAnswerRow(row: Row): AnswerRecord {
  return {
    index: Number(row.idx),
    questionText: String(row.question_text),
    text: String(row.answer_text),
    answeredAt: toIso(row.answered_at),
  };
}

function mapApplicationRow(row: Row, answers: AnswerRecord[]): ApplicationRecord {
  return {
    id: String(row.id),
    applicantId: String(row.applicant_id),
    applicantName: toStringOrNull(row.applicant_name),
    status: parseStatus(row.status),
    answers,
    reviewerId: toStringOrNull(row.reviewer_id),
    score: toNumberOrNull(row.score),
    scale: toNumberOrNull(row.scale),
    decision: parseDecision(row.decision),
    reason: toStringOrNull(row.reason),
    createdAt: toIso(row.created_at),
    submittedAt: toIsoOrNull(row.submitted_at),
    claimedAt: toIsoOrNull(row.claimed_at),
    scoredAt: toIsoOrNull(row.scored_at),
    decidedAt: toIsoOrNull(row.decided_at),
  };
}

export class PgApplicationRepo implements ApplicationRepo {
  public constructor(private readonly db: SqlPool) {}

  public async create(input: CreateApplicationInput): Promise<ApplicationRecord> {
    try {
      const result = await this.db.query(
        `insert into applications (id, applicant_id, applicant_name, status, created_at)
         values ($1, $2, $3, 'IN_PROGRESS', $4)
         returning *`,
        [newApplicationId(), input.applicantId, input.applicantName ?? null, new Date()],
      );
      return mapApplicationRow(result.rows[0], []);
    } catch (error) {
      // applications_one_active_per_applicant
      if (isUniqueViolation(error)) {
        throw new WorkflowError("duplicate_active_application");
      }
      throw error;
    }
  }

  public async appendAnswer(id: string, index: number, questionText: string, text: string): Promise<ApplicationRecord> {
    const client = await this.db.connect();

    try {
      await client.query("begin");
      const current = await this.loadForUpdate(client, id);
      assertCanAppend(current, index);

      await client.query(
        `insert into application_answers (application_id, idx, question_text, answer_text, answered_at)
         values ($1, $2, $3, $4, $5)`,
        [id, index, questionText, text, new Date()],
      );

      await client.query("commit");
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }

    return this.requireById(id);
  }

  public async submit(id: string, expectedAnswers: number): Promise<ApplicationRecord> {
    return this.guardedUpdate(
      id,
      (app) => assertCanSubmit(app, expectedAnswers),
      `update applications
       set status = 'SUBMITTED',
           submitted_at = $3
       where id = $1
         and status = 'IN_PROGRESS'
         and (select count(*) from application_answers where application_id = $1) >= $2`,
      [id, expectedAnswers, new Date()],
    );
  }

  public async claim(id: string, reviewerId: string): Promise<ApplicationRecord> {
    return this.guardedUpdate(
      id,
      (app) => assertCanClaim(app),
      `update applications
       set status = 'CLAIMED',
           reviewer_id = $2,
           claimed_at = $3
       where id = $1
         and status = 'SUBMITTED'
         and reviewer_id is null`,
      [id, reviewerId, new Date()],
    );
  }

  public async setScore(id: string, reviewerId: string, value: number, scale: number): Promise<ApplicationRecord> {
    return this.guardedUpdate(
      id,
      (app) => assertCanScore(app, reviewerId, value, scale),
      `update applications
       set status = 'SCORED',
           score = $3,
           scale = $4,
           scored_at = $5
       where id = $1
         and status = 'CLAIMED'
         and reviewer_id = $2
         and score is null`,
      [id, reviewerId, value, scale, new Date()],
    );
  }

  public async decide(id: string, reviewerId: string, decision: Decision, reason: string): Promise<ApplicationRecord> {
    return this.guardedUpdate(
      id,
      (app) => assertCanDecide(app, reviewerId),
      `update applications
       set status = $3,
           decision = $3,
           reason = $4,
           decided_at = $5
       where id = $1
         and status = 'SCORED'
         and reviewer_id = $2
         and score is not null
         and decision is null`,
      [id, reviewerId, decision, reason, new Date()],
    );
  }

  public async findById(id: string): Promise<ApplicationRecord | null> {
    const result = await this.db.query(
      `select *
       from applications
       where id = $1
       limit 1`,
      [id],
    );

    if (result.rowCount !== 1) {
      return null;
    }

    return mapApplicationRow(result.rows[0], await this.listAnswers(id));
  }

  public async findByApplicant(applicantId: string): Promise<ApplicationRecord | null> {
    const result = await this.db.query(
      `select *
       from applications
       where applicant_id = $1
       order by created_at desc
       limit 1`,
      [applicantId],
    );

    if (result.rowCount !== 1) {
      return null;
    }

    const row = result.rows[0];
    return mapApplicationRow(row, await this.listAnswers(String(row.id)));
  }

  /**
   * Checks the transition against the current row, then applies it as a
   * conditional update. When a concurrent writer wins the race the update
   * matches nothing and the check is replayed against the fresh row to report
   * why.
   */
  private async guardedUpdate(
    id: string,
    check: (app: ApplicationRecord) => void,
    sql: string,
    params: unknown[],
  ): Promise<ApplicationRecord> {
    check(await this.requireById(id));

    const result = await this.db.query(sql, params);
    if (result.rowCount !== 1) {
      check(await this.requireById(id));
      throw new WorkflowError("invalid_state", `concurrent update on application ${id}`);
    }

    return this.requireById(id);
  }

  private async loadForUpdate(client: SqlSession, id: string): Promise<ApplicationRecord> {
    const result = await client.query(
      `select *
       from applications
       where id = $1
       for update`,
      [id],
    );

    if (result.rowCount !== 1) {
      throw new WorkflowError("not_found", `application ${id} not found`);
    }

    return mapApplicationRow(result.rows[0], await this.listAnswers(id, client));
  }

  private async requireById(id: string): Promise<ApplicationRecord> {
    const app = await this.findById(id);
    if (!app) {
      throw new WorkflowError("not_found", `application ${id} not found`);
    }
    return app;
  }

  private async listAnswers(id: string, executor: SqlExecutor = this.db): Promise<AnswerRecord[]> {
    const result = await executor.query(
      `select idx, question_text, answer_text, answered_at
       from application_answers
       where application_id = $1
       order by idx asc`,
      [id],
    );

    return result.rows.map(mapAnswerRow);
  }
}
