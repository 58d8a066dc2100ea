import { ErrorKind } from '../errors/ErrorClassifier';

export interface ErrorRecord {
  action: string;
  kind: ErrorKind;
  step: number;
  time: Date;
}

export const ERROR_LOG_CAPACITY = 10;

/**
 * Ring buffer of recent invocation failures, consulted before recovering.
 */
export class ErrorLog {
  private readonly records: ErrorRecord[] = [];

  constructor(private readonly capacity: number = ERROR_LOG_CAPACITY) {}

  add(action: string, kind: ErrorKind, step: number, time: Date = new Date()): ErrorRecord {
    const record: ErrorRecord = { action, kind, step, time };
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
    return record;
  }

  latest(): ErrorRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /**
   * True when `action` failed at least `threshold` times within the last `window` records.
   */
  hasRecentRetries(action: string, threshold = 2, window = 5): boolean {
    const recent = this.records.slice(-window);
    return recent.filter(r => r.action === action).length >= threshold;
  }

  get size(): number {
    return this.records.length;
  }

  all(): ErrorRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records.length = 0;
  }
}
