import { and, asc, count, eq, gte, lte, type SQL } from 'drizzle-orm';
import type { BehaviorLog } from '@policyminer/protocol';
import type { DatabaseExecutor } from '../db.js';
import { behaviorLogs } from '../schema/index.js';
import type { BehaviorLogRepository, BehaviorLogFilter } from '../../interfaces/index.js';
import { chunkRows, rowToBehaviorLog, toBehaviorLogInsert } from './rows.js';

export class PgBehaviorLogRepository implements BehaviorLogRepository {
  constructor(private db: DatabaseExecutor) {}

  async append(log: BehaviorLog): Promise<BehaviorLog> {
    await this.db.insert(behaviorLogs).values(toBehaviorLogInsert(log));
    return log;
  }

  async appendMany(logs: readonly BehaviorLog[]): Promise<number> {
    if (logs.length === 0) {
      return 0;
    }
    // Chunked to stay under the driver's parameter limit; all or nothing
    await this.db.transaction(async (tx) => {
      for (const chunk of chunkRows(logs.map(toBehaviorLogInsert))) {
        await tx.insert(behaviorLogs).values(chunk);
      }
    });
    return logs.length;
  }

  async list(filter: BehaviorLogFilter = {}): Promise<BehaviorLog[]> {
    // Insertion order is the canonical enumeration order
    let query = this.db
      .select()
      .from(behaviorLogs)
      .where(and(...this.conditions(filter)))
      .orderBy(asc(behaviorLogs.seq))
      .$dynamic();

    if (filter.limit) {
      query = query.limit(filter.limit);
    }

    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToBehaviorLog);
  }

  async count(filter: BehaviorLogFilter = {}): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(behaviorLogs)
      .where(and(...this.conditions(filter)));

    return row?.value ?? 0;
  }

  private conditions(filter: BehaviorLogFilter): SQL[] {
    const conditions: SQL[] = [];

    if (filter.agentId !== undefined) {
      conditions.push(eq(behaviorLogs.agentId, filter.agentId));
    }
    if (filter.action !== undefined) {
      conditions.push(eq(behaviorLogs.action, filter.action));
    }
    if (filter.since !== undefined) {
      conditions.push(gte(behaviorLogs.occurredAt, new Date(filter.since)));
    }
    if (filter.until !== undefined) {
      conditions.push(lte(behaviorLogs.occurredAt, new Date(filter.until)));
    }

    return conditions;
  }
}
