import type { DbClient } from "../lib/db.js";

export interface CooldownRepo {
  lastAppliedAt(applicantId: string): Promise<Date | null>;
  touch(applicantId: string, at: Date): Promise<void>;
}

export class PgCooldownRepo implements CooldownRepo {
  public constructor(private readonly db: DbClient) {}

  public async lastAppliedAt(applicantId: string): Promise<Date | null> {
    const result = await this.db.query<{ last_applied_at: Date }>(
      `select last_applied_at
       from application_cooldowns
       where applicant_id = $1
       limit 1`,
      [applicantId],
    );

    if (result.rowCount !== 1) {
      return null;
    }

    return new Date(result.rows[0].last_applied_at);
  }

  public async touch(applicantId: string, at: Date): Promise<void> {
    await this.db.query(
      `insert into application_cooldowns (applicant_id, last_applied_at)
       values ($1, $2)
       on conflict (applicant_id)
       do update set last_applied_at = excluded.last_applied_at`,
      [applicantId, at],
    );
  }
}
