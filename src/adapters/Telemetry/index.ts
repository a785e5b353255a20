import type { ApplicationEvent, ApplicationEventBus } from '../../application';
import { TELEMETRY_BUFFER_LIMIT } from '../../config/engine-defaults';
import { MODULE_IDS } from '../../shared/module-ids';

export type TelemetrySink = (event: ApplicationEvent) => void;

export interface TelemetryOptions {
  readonly bufferLimit?: number;
  readonly sinks?: readonly TelemetrySink[];
}

export interface TelemetryModule {
  readonly moduleName: typeof MODULE_IDS.telemetry;
  start: () => void;
  stop: () => void;
  getBufferedEvents: () => readonly ApplicationEvent[];
}

function describePayload(event: ApplicationEvent): string {
  switch (event.eventType) {
    case 'engine/generation-started':
      return `words=${event.payload.wordCount} grid=${event.payload.width}x${event.payload.height} wrap=${event.payload.wrap} units=${event.payload.unitCount} trials=${event.payload.trialsPerUnit} seed=${event.payload.seed}`;
    case 'engine/unit-completed':
      return `unit=${event.payload.unitIndex} trials=${event.payload.trialsRun} best=${event.payload.bestDensity ?? 'none'} cancelled=${event.payload.cancelled}`;
    case 'engine/generation-completed':
      return `density=${event.payload.density} placed=${event.payload.placedWordCount} unplaced=${event.payload.unplacedWordCount} trials=${event.payload.trialsRun} ms=${event.payload.durationMs}`;
    case 'engine/generation-cancelled':
      return `trials=${event.payload.trialsRun} ms=${event.payload.durationMs}`;
    case 'engine/generation-rejected':
      return `code=${event.payload.code}`;
  }
}

export function formatEventLine(event: ApplicationEvent): string {
  return `[${event.eventType}] ${event.correlationId} ${describePayload(event)}`;
}

export function createTelemetryModule(
  eventBus: ApplicationEventBus,
  options: TelemetryOptions = {},
): TelemetryModule {
  const bufferLimit = Math.max(1, Math.trunc(options.bufferLimit ?? TELEMETRY_BUFFER_LIMIT));
  const sinks = options.sinks ?? [];
  const bufferedEvents: ApplicationEvent[] = [];
  let unsubscribe: (() => void) | null = null;

  return {
    moduleName: MODULE_IDS.telemetry,
    start: () => {
      if (!unsubscribe) {
        unsubscribe = eventBus.subscribe((event) => {
          bufferedEvents.push(event);
          if (bufferedEvents.length > bufferLimit) {
            bufferedEvents.splice(0, bufferedEvents.length - bufferLimit);
          }

          sinks.forEach((sink) => {
            sink(event);
          });
        });
      }
    },
    stop: () => {
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }
    },
    getBufferedEvents: () => bufferedEvents,
  };
}
