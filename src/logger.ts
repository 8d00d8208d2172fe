import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { EventBus } from './events/eventBus.js';
import type { DiagnosticEvent, DispatchLogEntry, LogType, Unsubscribe } from './types.js';
import { isTruthyFlag } from './utils.js';

const TYPE_COLORS: Record<LogType, (c: ChalkInstance) => ChalkInstance> = {
  SYSTEM: c => c.gray,
  ROUND: c => c.cyan,
  DELIVERED: c => c.green,
  FAILED: c => c.red,
  TIMED_OUT: c => c.yellow,
  REGISTRY: c => c.blue,
};

export interface DispatchLoggerOptions {
  /** Most recent entries kept in memory; older ones are dropped. */
  maxEntries?: number;
  /** chalk colour level; defaults to whatever chalk detected for stdout. */
  colorLevel?: 0 | 1 | 2 | 3;
}

export class DispatchLogger {
  private logs: DispatchLogEntry[] = [];
  private consoleOutputEnabled = true;
  private persistenceFile: string | null = null;
  private readonly maxEntries: number;
  private readonly chalk: ChalkInstance;
  private readonly subscribers = new EventBus<DispatchLogEntry>();

  constructor(options: DispatchLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.chalk = options.colorLevel === undefined ? chalk : new Chalk({ level: options.colorLevel });
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /**
   * Write the in-memory log as JSON to `filePath` after every entry, or stop
   * persisting with `null`. The parent directory is created on demand.
   */
  setPersistenceFile(filePath: string | null) {
    this.persistenceFile = filePath;
    if (filePath) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.flush();
    }
  }

  subscribe(cb: (entry: DispatchLogEntry) => void): Unsubscribe {
    return this.subscribers.subscribe(cb);
  }

  getLogs(): DispatchLogEntry[] {
    // Return a shallow copy so callers can't mutate logger state.
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
  }

  /**
   * Forward every diagnostic published on `bus` (typically `dispatcher.events`)
   * into this logger. Returns the detach function.
   */
  attach(bus: EventBus<DiagnosticEvent>): Unsubscribe {
    return bus.subscribe(event => {
      this.log(event);
    });
  }

  log(entry: DiagnosticEvent): DispatchLogEntry {
    const fullEntry: DispatchLogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    this.handleEntry(fullEntry);
    return fullEntry;
  }

  /** Single console line for `entry`, coloured with this logger's chalk level. */
  format(entry: DispatchLogEntry): string {
    const c = this.chalk;
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = c.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](c)(`[${entry.type}]`);

    let subscriberInfo = '';
    const subscriber = entry.metadata?.subscriber;
    if (subscriber) {
      const label = entry.metadata?.label;
      subscriberInfo = ` <${c.hex('#FFA500')(label ? `${label} ${subscriber}` : subscriber)}>`;
    }

    return `${prefix} ${typeStr}${subscriberInfo}: ${entry.content}`;
  }

  private handleEntry(entry: DispatchLogEntry) {
    this.logs.push(entry);
    if (this.logs.length > this.maxEntries) {
      this.logs.splice(0, this.logs.length - this.maxEntries);
    }
    this.flush();
    this.subscribers.emit(entry);

    if (!this.consoleOutputEnabled) return;

    // One line per delivery is noisy; opt in via env var.
    if (entry.type === 'DELIVERED' && !isTruthyFlag(process.env.FANOUT_LOG_DELIVERIES)) {
      return;
    }

    console.log(this.format(entry));
  }

  private flush() {
    if (!this.persistenceFile) return;
    fs.writeFileSync(this.persistenceFile, JSON.stringify(this.logs, errorSafe, 2));
  }
}

function errorSafe(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const logger = new DispatchLogger();
