import { moduleLogger } from '../utils/logger';
import type { Actor } from '../types/observation';

const logger = moduleLogger('audit');

export type AuditAction =
  | 'OBS_CREATE'
  | 'OBS_GROUP_CREATE'
  | 'OBS_UPDATE'
  | 'OBS_VOID'
  | 'OBS_UNVOID'
  | 'OBS_DELETE'
  | 'OBS_ACCESS_DENIED';

export interface AuditEvent {
  action: AuditAction;
  actor?: Actor;
  obsIds: number[];
  personId?: number;
  reason?: string;
  details?: Record<string, unknown>;
}

export interface AuditSink {
  record(event: AuditEvent & { timestamp: string }): void;
}

const loggerSink: AuditSink = {
  record(event) {
    // Physical deletion leaves no row behind, so it is the one event that
    // must stand out in the log stream.
    const level = event.action === 'OBS_DELETE' || event.action === 'OBS_ACCESS_DENIED' ? 'warn' : 'info';
    logger.log(level, '[AUDIT]', { audit: event });
  }
};

/**
 * Records observation lifecycle transitions.
 */
class AuditService {
  constructor(private readonly sink: AuditSink = loggerSink) {}

  log(event: AuditEvent): void {
    try {
      this.sink.record({ ...event, timestamp: new Date().toISOString() });
    } catch (error) {
      // A broken sink must not undo a write that already committed.
      logger.error('Audit logging failed', { error, action: event.action, obsIds: event.obsIds });
    }
  }
}

export default AuditService;
