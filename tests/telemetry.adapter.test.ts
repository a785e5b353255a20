import { describe, expect, it } from 'vitest';

import { createApplicationLayer, type ApplicationEvent } from '../src/application';
import { createTelemetryModule, formatEventLine } from '../src/adapters/Telemetry';

function rejectedEvent(eventId: string): ApplicationEvent {
  return {
    eventId,
    eventType: 'engine/generation-rejected',
    eventVersion: 1,
    occurredAt: 1,
    correlationId: 'job-1',
    payload: { code: 'engine.invalid-words', message: 'bad words' },
  };
}

describe('telemetry adapter', () => {
  it('formats one line per event', () => {
    expect(formatEventLine(rejectedEvent('evt-1'))).toBe(
      '[engine/generation-rejected] job-1 code=engine.invalid-words',
    );
    expect(
      formatEventLine({
        eventId: 'evt-2',
        eventType: 'engine/generation-started',
        eventVersion: 1,
        occurredAt: 1,
        correlationId: 'job-1',
        payload: {
          wordCount: 3,
          width: 5,
          height: 5,
          wrap: false,
          seed: 7,
          unitCount: 2,
          trialsPerUnit: 10,
        },
      }),
    ).toBe('[engine/generation-started] job-1 words=3 grid=5x5 wrap=false units=2 trials=10 seed=7');
    expect(
      formatEventLine({
        eventId: 'evt-3',
        eventType: 'engine/unit-completed',
        eventVersion: 1,
        occurredAt: 1,
        correlationId: 'job-1',
        payload: { unitIndex: 0, unitSeed: 11, trialsRun: 0, bestDensity: null, cancelled: true },
      }),
    ).toBe('[engine/unit-completed] job-1 unit=0 trials=0 best=none cancelled=true');
  });

  it('buffers the newest events and forwards them to sinks', () => {
    const application = createApplicationLayer();
    const forwarded: string[] = [];
    const telemetry = createTelemetryModule(application.events, {
      bufferLimit: 2,
      sinks: [(event) => forwarded.push(event.eventId)],
    });

    telemetry.start();
    telemetry.start();
    application.events.publish(rejectedEvent('evt-1'));
    application.events.publish(rejectedEvent('evt-2'));
    application.events.publish(rejectedEvent('evt-3'));

    expect(telemetry.moduleName).toBe('Telemetry');
    expect(forwarded).toEqual(['evt-1', 'evt-2', 'evt-3']);
    expect(telemetry.getBufferedEvents().map((event) => event.eventId)).toEqual(['evt-2', 'evt-3']);
  });

  it('stops listening after stop', () => {
    const application = createApplicationLayer();
    const telemetry = createTelemetryModule(application.events);

    telemetry.start();
    application.events.publish(rejectedEvent('evt-1'));
    telemetry.stop();
    application.events.publish(rejectedEvent('evt-2'));

    expect(telemetry.getBufferedEvents().map((event) => event.eventId)).toEqual(['evt-1']);
  });
});
