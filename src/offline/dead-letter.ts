import { z } from "zod";
import { appendJsonLine, readJsonLines } from "../storage/json-state.js";
import type { JsonObject } from "../utils/records.js";
import { eventMessageId, eventName } from "./events.js";

export const DeadLetterRecordSchema = z.object({
  tenant: z.string(),
  event: z.string().nullable(),
  messageId: z.string().nullable(),
  retryCount: z.number().int().nonnegative(),
  error: z.string(),
  payload: z.record(z.unknown()),
  ts: z.number().int(),
});

export type DeadLetterRecord = z.infer<typeof DeadLetterRecordSchema>;

export interface DeadLetterInput {
  tenant: string;
  item: JsonObject;
  error: string;
  retries: number;
}

/**
 * Append-only JSON lines file of events that will not be retried. Rows are
 * never rewritten here; operators consume the file externally.
 */
export class DeadLetterQueue {
  readonly file: string;
  private readonly now: () => number;

  constructor(file: string, now: () => number = Date.now) {
    this.file = file;
    this.now = now;
  }

  async append(input: DeadLetterInput): Promise<DeadLetterRecord> {
    const row: DeadLetterRecord = {
      tenant: input.tenant,
      event: eventName(input.item),
      messageId: eventMessageId(input.item),
      retryCount: input.retries,
      error: input.error,
      payload: input.item,
      ts: Math.floor(this.now() / 1000),
    };
    await appendJsonLine(this.file, row);
    return row;
  }

  async readAll(): Promise<DeadLetterRecord[]> {
    const rows = await readJsonLines(this.file);
    return rows.map((row) => DeadLetterRecordSchema.parse(row));
  }
}
