import { EventEmitter } from "events";
import type { AttendanceEvent } from "../types/attendance";

export type FeedEvent = {
  seq: number;
  at: string;
  eventId: string;
  employeeId: string;
  kind: AttendanceEvent["kind"];
  shift: AttendanceEvent["shift"];
  timing: AttendanceEvent["timing"];
  date: string;
  time: string;
};

export type FeedPage = { latest_seq: number; events: FeedEvent[] };

/**
 * In-memory ring of recently recorded attendance, so dashboards can
 * long-poll instead of re-reading history. Not durable; sequence numbers
 * restart with the process.
 */
export class AttendanceFeed {
  private seq = 0;
  private events: FeedEvent[] = [];
  private readonly emitter = new EventEmitter();

  constructor(private readonly maxEvents: number = 500) {
    // long-polling can create many concurrent listeners
    this.emitter.setMaxListeners(0);
  }

  get latestSeq(): number {
    return this.seq;
  }

  push(event: AttendanceEvent, at: Date = new Date()): number {
    this.seq += 1;
    const seq = this.seq;

    this.events.push({
      seq,
      at: at.toISOString(),
      eventId: event.id,
      employeeId: event.employeeId,
      kind: event.kind,
      shift: event.shift,
      timing: event.timing,
      date: event.date,
      time: event.time,
    });
    if (this.maxEvents > 0 && this.events.length > this.maxEvents) {
      this.events = this.events.slice(-this.maxEvents);
    }

    this.emitter.emit("new", seq);
    return seq;
  }

  snapshot(afterSeq: number, limit: number): FeedPage {
    const events = this.events.filter((e) => e.seq > afterSeq).slice(0, limit);
    return { latest_seq: this.seq, events };
  }

  /**
   * Events after `afterSeq`. With `waitMs` > 0 and nothing new, waits until
   * an event arrives, the wait elapses, or `signal` aborts.
   */
  async poll(params: {
    afterSeq?: number;
    limit?: number;
    waitMs?: number;
    signal?: AbortSignal;
  }): Promise<FeedPage> {
    const afterSeq = Math.max(0, Number(params.afterSeq ?? 0) || 0);
    const limit = Math.min(Math.max(Number(params.limit ?? 50) || 50, 1), 200);
    const waitMs = Math.min(Math.max(Number(params.waitMs ?? 0) || 0, 0), 300_000);
    const signal = params.signal;

    const immediate = this.snapshot(afterSeq, limit);
    if (immediate.events.length > 0 || waitMs <= 0) return immediate;

    return await new Promise<FeedPage>((resolve) => {
      let done = false;
      let timer: NodeJS.Timeout | null = null;

      const cleanup = () => {
        done = true;
        if (timer) clearTimeout(timer);
        this.emitter.removeListener("new", onNew);
        if (signal) signal.removeEventListener("abort", finish);
      };

      function finishWith(page: FeedPage) {
        cleanup();
        resolve(page);
      }

      const finish = () => {
        if (done) return;
        finishWith(this.snapshot(afterSeq, limit));
      };

      const onNew = () => {
        if (done || this.seq <= afterSeq) return;
        finish();
      };

      if (signal?.aborted) return finish();
      if (signal) signal.addEventListener("abort", finish, { once: true });

      this.emitter.on("new", onNew);
      timer = setTimeout(finish, waitMs);
    });
  }
}
