/**
 * Event Stream for workflow progress
 * Structured node/workflow events for the presentation layer, kept apart from document data
 */

import { EventEmitter } from 'events';

export type EventType =
  // Workflow lifecycle
  | 'workflow:started'
  | 'workflow:completed'
  | 'workflow:cancelled'
  | 'workflow:failed'
  // Node lifecycle
  | 'node:started'
  | 'node:completed'
  | 'node:failed'
  | 'node:retry'
  // Loop
  | 'review:verdict'
  | 'loop:max_iterations'
  // Requirement structure check
  | 'requirement:warning';

export type EventSeverity = 'info' | 'warn' | 'error';

export interface WorkflowEvent {
  id: string;
  type: EventType;
  timestamp: string;
  severity: EventSeverity;
  node?: string;
  data: Record<string, unknown>;
}

export interface EventFilter {
  types?: EventType[];
  severity?: EventSeverity[];
  since?: string; // Event ID to start from
  node?: string;
  limit?: number;
}

export type EventListener = (event: WorkflowEvent) => void;

/**
 * Buffers events for polling and pushes them to subscribers
 */
export class WorkflowEventStream {
  private events: WorkflowEvent[] = [];
  private eventCounter = 0;
  private emitter = new EventEmitter();

  constructor(private maxEvents: number = 1000) {}

  emit(
    type: EventType,
    data: Record<string, unknown> = {},
    options: { severity?: EventSeverity; node?: string } = {}
  ): WorkflowEvent {
    const event: WorkflowEvent = {
      id: `evt-${Date.now()}-${++this.eventCounter}`,
      type,
      timestamp: new Date().toISOString(),
      severity: options.severity || 'info',
      node: options.node,
      data,
    };

    this.events.push(event);

    if (this.events.length > this.maxEvents) {
      this.events = this.events.slice(-this.maxEvents);
    }

    this.emitter.emit('event', event);
    return event;
  }

  /**
   * Register a listener; returns the function that removes it
   */
  subscribe(listener: EventListener): () => void {
    this.emitter.on('event', listener);
    return () => {
      this.emitter.off('event', listener);
    };
  }

  /**
   * Poll for events matching filter criteria
   */
  poll(filter: EventFilter = {}): WorkflowEvent[] {
    let result = [...this.events];

    if (filter.since) {
      const sinceIndex = result.findIndex(e => e.id === filter.since);
      if (sinceIndex !== -1) {
        result = result.slice(sinceIndex + 1);
      }
    }

    const { types, severity, node } = filter;

    if (types && types.length > 0) {
      result = result.filter(e => types.includes(e.type));
    }

    if (severity && severity.length > 0) {
      result = result.filter(e => severity.includes(e.severity));
    }

    if (node) {
      result = result.filter(e => e.node === node);
    }

    if (filter.limit && filter.limit > 0) {
      result = result.slice(-filter.limit);
    }

    return result;
  }

  getByType(type: EventType): WorkflowEvent[] {
    return this.events.filter(e => e.type === type);
  }

  /**
   * Warnings and errors
   */
  getIssues(): WorkflowEvent[] {
    return this.events.filter(e => e.severity === 'warn' || e.severity === 'error');
  }

  clear(): void {
    this.events = [];
    this.eventCounter = 0;
  }

  count(): number {
    return this.events.length;
  }

  getLastEventId(): string | null {
    if (this.events.length === 0) return null;
    return this.events[this.events.length - 1].id;
  }
}

let eventStreamInstance: WorkflowEventStream | null = null;

/**
 * Get the process-wide event stream, used when a run is not given its own
 */
export function getEventStream(): WorkflowEventStream {
  if (!eventStreamInstance) {
    eventStreamInstance = new WorkflowEventStream();
  }
  return eventStreamInstance;
}
