import test from "node:test";
import assert from "node:assert/strict";
import type { QueryResult, QueryResultRow } from "pg";
import type { SqlPool, SqlSession } from "../lib/db.js";
import { isWorkflowError } from "../lib/errors.js";
import { PgApplicationRepo } from "./application-repo.js";

function result(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
  return { command: "", rowCount: rows.length, oid: 0, fields: [], rows };
}

// A pool with a single connection: pool queries wait while a session is checked out.
class SingleConnectionPool implements SqlPool {
  public readonly answers: QueryResultRow[] = [];
  private busy = false;
  private readonly waiting: Array<() => void> = [];

  public constructor(private readonly application: QueryResultRow) {}

  public async query(text: string, values: unknown[] = []): Promise<QueryResult<QueryResultRow>> {
    await this.acquire();
    try {
      return this.execute(text, values);
    } finally {
      this.free();
    }
  }

  public async connect(): Promise<SqlSession> {
    await this.acquire();
    let released = false;
    return {
      query: async (text, values = []) => this.execute(text, values),
      release: () => {
        if (!released) {
          released = true;
          this.free();
        }
      },
    };
  }

  private execute(text: string, values: unknown[]): QueryResult<QueryResultRow> {
    if (text.includes("insert into application_answers")) {
      const [applicationId, idx, questionText, answerText, answeredAt] = values;
      this.answers.push({
        application_id: applicationId,
        idx,
        question_text: questionText,
        answer_text: answerText,
        answered_at: answeredAt,
      });
      return result([]);
    }
    if (text.includes("from application_answers")) {
      return result(this.answers.filter((answer) => answer.application_id === values[0]));
    }
    if (text.includes("from applications")) {
      return result(values[0] === this.application.id ? [this.application] : []);
    }
    return result([]);
  }

  private async acquire(): Promise<void> {
    if (!this.busy) {
      this.busy = true;
      return;
    }
    await new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  private free(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.busy = false;
    }
  }
}

const inProgress: QueryResultRow = {
  id: "app_1",
  applicant_id: "u1",
  applicant_name: null,
  status: "IN_PROGRESS",
  reviewer_id: null,
  score: null,
  scale: null,
  decision: null,
  reason: null,
  created_at: new Date("2026-03-01T10:00:00.000Z"),
  submitted_at: null,
  claimed_at: null,
  scored_at: null,
  decided_at: null,
};

test("appending an answer completes on a single-connection pool", { timeout: 2000 }, async () => {
  const pool = new SingleConnectionPool(inProgress);
  const repo = new PgApplicationRepo(pool);

  const updated = await repo.appendAnswer("app_1", 0, "Why?", "Because");

  assert.deepEqual(
    updated.answers.map((answer) => [answer.index, answer.questionText, answer.text]),
    [[0, "Why?", "Because"]],
  );
});

test("concurrent appends for one question queue on the connection and one wins", { timeout: 2000 }, async () => {
  const pool = new SingleConnectionPool(inProgress);
  const repo = new PgApplicationRepo(pool);

  const results = await Promise.allSettled([
    repo.appendAnswer("app_1", 0, "Why?", "first"),
    repo.appendAnswer("app_1", 0, "Why?", "second"),
  ]);

  assert.deepEqual(
    results.map((outcome) => outcome.status),
    ["fulfilled", "rejected"],
  );
  const rejected = results[1];
  assert.ok(rejected.status === "rejected" && isWorkflowError(rejected.reason));
  assert.equal(rejected.reason.code, "invalid_state");
  assert.equal(pool.answers.length, 1);
  assert.equal(pool.answers[0].answer_text, "first");
});
