/**
 * Audit Log Service
 *
 * Operator-visible trail of measurement events, kept in an in-memory ring
 * buffer.
 *
 * Event categories:
 * - QUALITY: item flagged by the engine, statistics refreshed
 * - RELIABILITY: coefficients stored, calculation failures
 * - SESSION: adaptive/fixed session completed or abandoned
 * - ADMIN: manual quality flag override
 * - SYSTEM: startup, shutdown
 *
 * Each event includes: timestamp, category, severity, action, description,
 * the item or session it concerns, and a unique eventId.
 */

import {
  ID_RANDOM_START,
  ID_RANDOM_LENGTH_SHORT,
} from "../config/id-generation-constants.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AuditCategory =
  | "QUALITY"
  | "RELIABILITY"
  | "SESSION"
  | "ADMIN"
  | "SYSTEM";

export type AuditSeverity = "info" | "warn" | "error" | "critical";

export interface AuditEvent {
  /** Unique event identifier */
  eventId: string;
  /** ISO timestamp */
  timestamp: string;
  category: AuditCategory;
  severity: AuditSeverity;
  /** Action performed (e.g., "item_flagged", "session_completed") */
  action: string;
  /** Human-readable description */
  description: string;
  /** Item the event concerns */
  itemId?: string;
  /** Test session the event concerns */
  sessionId?: string;
  /** Additional structured data */
  metadata?: Record<string, unknown>;
  /** Source component that generated the event */
  source: string;
}

export interface AuditLogQuery {
  category?: AuditCategory;
  severity?: AuditSeverity;
  itemId?: string;
  sessionId?: string;
  action?: string;
  source?: string;
  startTime?: string;
  endTime?: string;
  limit?: number;
  offset?: number;
}

export interface AuditLogStats {
  totalEvents: number;
  byCategory: Record<AuditCategory, number>;
  bySeverity: Record<AuditSeverity, number>;
  oldestEvent: string | null;
  newestEvent: string | null;
}

// ---------------------------------------------------------------------------
// In-Memory State
// ---------------------------------------------------------------------------

/** Maximum events to keep in memory */
const MAX_BUFFER_SIZE = 5000;

const eventBuffer: AuditEvent[] = [];
let eventCounter = 0;

function generateEventId(): string {
  eventCounter++;
  return `evt_${Date.now()}_${eventCounter.toString(36)}_${Math.random().toString(36).slice(ID_RANDOM_START, ID_RANDOM_START + ID_RANDOM_LENGTH_SHORT)}`;
}

// ---------------------------------------------------------------------------
// Core Functions
// ---------------------------------------------------------------------------

/**
 * Log an audit event.
 *
 * Error and critical events are also written to the console immediately.
 */
export function logAuditEvent(
  params: Omit<AuditEvent, "eventId" | "timestamp">,
): AuditEvent {
  const event: AuditEvent = {
    eventId: generateEventId(),
    timestamp: new Date().toISOString(),
    ...params,
  };

  eventBuffer.push(event);
  if (eventBuffer.length > MAX_BUFFER_SIZE) {
    eventBuffer.splice(0, eventBuffer.length - MAX_BUFFER_SIZE);
  }

  if (event.severity === "critical") {
    console.error(
      `[AUDIT:CRITICAL] ${event.action}: ${event.description}`,
      event.metadata ? JSON.stringify(event.metadata) : "",
    );
  } else if (event.severity === "error") {
    console.error(`[AUDIT:ERROR] ${event.action}: ${event.description}`);
  }

  return event;
}

// ---------------------------------------------------------------------------
// Convenience Loggers
// ---------------------------------------------------------------------------

/** Log an item quality event */
export function logQualityEvent(
  action: string,
  description: string,
  itemId: string,
  severity: AuditSeverity = "info",
  metadata?: Record<string, unknown>,
): AuditEvent {
  return logAuditEvent({
    category: "QUALITY",
    severity,
    action,
    description,
    itemId,
    metadata,
    source: "quality-flag-controller",
  });
}

/** Log a reliability calculation event */
export function logReliabilityEvent(
  action: string,
  description: string,
  severity: AuditSeverity = "info",
  metadata?: Record<string, unknown>,
): AuditEvent {
  return logAuditEvent({
    category: "RELIABILITY",
    severity,
    action,
    description,
    metadata,
    source: "reliability-estimator",
  });
}

/** Log a session lifecycle event */
export function logSessionEvent(
  action: string,
  description: string,
  sessionId: string,
  metadata?: Record<string, unknown>,
): AuditEvent {
  return logAuditEvent({
    category: "SESSION",
    severity: "info",
    action,
    description,
    sessionId,
    metadata,
    source: "adaptive-engine",
  });
}

/** Log an admin action */
export function logAdminEvent(
  action: string,
  description: string,
  itemId?: string,
  metadata?: Record<string, unknown>,
): AuditEvent {
  return logAuditEvent({
    category: "ADMIN",
    severity: "warn",
    action: `admin_${action}`,
    description,
    itemId,
    metadata,
    source: "admin",
  });
}

/** Log a system event */
export function logSystemEvent(
  action: string,
  description: string,
  severity: AuditSeverity = "info",
  metadata?: Record<string, unknown>,
): AuditEvent {
  return logAuditEvent({
    category: "SYSTEM",
    severity,
    action,
    description,
    metadata,
    source: "system",
  });
}

// ---------------------------------------------------------------------------
// Query Functions
// ---------------------------------------------------------------------------

/**
 * Query audit events with filtering and pagination. Newest first.
 */
export function queryAuditLog(query: AuditLogQuery = {}): {
  events: AuditEvent[];
  total: number;
  limit: number;
  offset: number;
} {
  const limit = query.limit ?? 50;
  const offset = query.offset ?? 0;
  const action = query.action?.toLowerCase();
  const { startTime, endTime } = query;

  let filtered = [...eventBuffer];

  if (query.category) {
    filtered = filtered.filter((e) => e.category === query.category);
  }
  if (query.severity) {
    filtered = filtered.filter((e) => e.severity === query.severity);
  }
  if (query.itemId) {
    filtered = filtered.filter((e) => e.itemId === query.itemId);
  }
  if (query.sessionId) {
    filtered = filtered.filter((e) => e.sessionId === query.sessionId);
  }
  if (action) {
    filtered = filtered.filter((e) => e.action.toLowerCase().includes(action));
  }
  if (query.source) {
    filtered = filtered.filter((e) => e.source === query.source);
  }
  if (startTime) {
    filtered = filtered.filter((e) => e.timestamp >= startTime);
  }
  if (endTime) {
    filtered = filtered.filter((e) => e.timestamp <= endTime);
  }

  // Newest first; buffer order breaks timestamp ties
  const order = new Map(eventBuffer.map((e, i) => [e.eventId, i]));
  filtered.sort(
    (a, b) =>
      b.timestamp.localeCompare(a.timestamp) ||
      (order.get(b.eventId) ?? 0) - (order.get(a.eventId) ?? 0),
  );

  const total = filtered.length;
  const events = filtered.slice(offset, offset + limit);

  return { events, total, limit, offset };
}

/**
 * Get audit log statistics.
 */
export function getAuditLogStats(): AuditLogStats {
  const byCategory: Record<AuditCategory, number> = {
    QUALITY: 0,
    RELIABILITY: 0,
    SESSION: 0,
    ADMIN: 0,
    SYSTEM: 0,
  };
  const bySeverity: Record<AuditSeverity, number> = {
    info: 0,
    warn: 0,
    error: 0,
    critical: 0,
  };

  for (const event of eventBuffer) {
    byCategory[event.category]++;
    bySeverity[event.severity]++;
  }

  return {
    totalEvents: eventBuffer.length,
    byCategory,
    bySeverity,
    oldestEvent: eventBuffer.length > 0 ? eventBuffer[0].timestamp : null,
    newestEvent:
      eventBuffer.length > 0 ? eventBuffer[eventBuffer.length - 1].timestamp : null,
  };
}

/**
 * Clear all in-memory audit events.
 */
export function clearAuditLog(): void {
  eventBuffer.length = 0;
  eventCounter = 0;
}
