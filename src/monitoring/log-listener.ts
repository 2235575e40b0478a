/**
 * Forwards monitoring events to a pino logger and, optionally, a JSON-lines file
 */

import { appendFileSync, mkdirSync } from 'fs';
import * as path from 'path';
import type { Logger } from '../logging/logger.js';
import type { EventSeverity, MonitoringEvent, MonitoringListener } from './callbacks.js';

export interface LogListenerOptions {
  /** Append each event as one JSON line */
  eventsFile?: string;
}

type PinoMethod = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVEL_FOR_SEVERITY: Record<EventSeverity, PinoMethod> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

export function createLogListener(logger: Logger, options: LogListenerOptions = {}): MonitoringListener {
  const { eventsFile } = options;
  if (eventsFile) {
    mkdirSync(path.dirname(eventsFile), { recursive: true });
  }

  return (event: MonitoringEvent) => {
    const { message, ...fields } = event;
    logger[LEVEL_FOR_SEVERITY[event.severity]]({ monitoringEvent: true, ...fields }, message);

    if (!eventsFile) return;
    try {
      appendFileSync(eventsFile, `${JSON.stringify(event)}\n`);
    } catch (error) {
      logger.error({ err: error, eventsFile }, 'Failed to write monitoring event to file');
    }
  };
}
