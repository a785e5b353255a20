import type { InitialPlacement } from '../config/engine-defaults';
import type { PlacedWord } from '../domain/Grid';
import type { CrosswordLayout } from '../domain/Layout';
import type { TrialUnitReport } from '../domain/TrialSelector';

export interface GridConfigurationRequest {
  readonly width: number;
  readonly height: number;
  readonly wrap?: boolean;
}

export interface ExecutionRequest {
  readonly trialsPerUnit?: number;
  readonly unitCount?: number;
  readonly seed?: number;
  readonly initialPlacement?: InitialPlacement;
}

export type ApplicationCommand =
  | {
      readonly type: 'GenerateCrossword';
      readonly words: readonly string[];
      readonly configuration: GridConfigurationRequest;
      readonly execution?: ExecutionRequest;
      readonly signal?: AbortSignal;
      readonly correlationId?: string;
    }
  | { readonly type: 'RankWords'; readonly words: readonly string[] };

export type ApplicationQuery = { readonly type: 'GetLastGeneration' };

export interface ApplicationError {
  readonly code: string;
  readonly message: string;
  readonly retryable: boolean;
  readonly context: Readonly<Record<string, unknown>>;
}

export interface ApplicationOkResult<TValue> {
  readonly type: 'ok';
  readonly value: TValue;
}

export interface ApplicationDomainErrorResult {
  readonly type: 'domainError';
  readonly error: ApplicationError;
}

export interface ApplicationInfraErrorResult {
  readonly type: 'infraError';
  readonly error: ApplicationError;
}

export type ApplicationResult<TValue> =
  | ApplicationOkResult<TValue>
  | ApplicationDomainErrorResult
  | ApplicationInfraErrorResult;

export interface GenerationMeta {
  readonly correlationId: string;
  readonly seed: number;
  readonly unitCount: number;
  readonly trialsPerUnit: number;
  readonly trialsRun: number;
  readonly cancelled: boolean;
  readonly units: readonly TrialUnitReport[];
}

export interface GeneratedCrossword {
  readonly width: number;
  readonly height: number;
  readonly wrap: boolean;
  readonly cells: readonly string[];
  readonly rows: readonly string[];
  readonly placements: readonly PlacedWord[];
  readonly placedWords: readonly string[];
  readonly unplacedWords: readonly string[];
  readonly density: number;
  readonly layout: CrosswordLayout;
  readonly meta: GenerationMeta;
}

export type CommandOutcome =
  | { readonly type: 'CrosswordGenerated'; readonly crossword: GeneratedCrossword }
  | { readonly type: 'WordsRanked'; readonly words: readonly string[] };

export interface ApplicationCommandBus {
  dispatch: (command: ApplicationCommand) => Promise<ApplicationResult<CommandOutcome>>;
}

export interface ApplicationQueryBus {
  execute: (query: ApplicationQuery) => ApplicationResult<GeneratedCrossword | null>;
}

export interface ApplicationReadModel {
  getLastGeneration: () => GeneratedCrossword | null;
}

export interface EventEnvelope<TEventType extends string, TPayload> {
  readonly eventId: string;
  readonly eventType: TEventType;
  readonly eventVersion: number;
  readonly occurredAt: number;
  readonly correlationId: string;
  readonly payload: TPayload;
}

export type GenerationStartedEvent = EventEnvelope<
  'engine/generation-started',
  {
    readonly wordCount: number;
    readonly width: number;
    readonly height: number;
    readonly wrap: boolean;
    readonly seed: number;
    readonly unitCount: number;
    readonly trialsPerUnit: number;
  }
>;

export type UnitCompletedEvent = EventEnvelope<'engine/unit-completed', TrialUnitReport>;

export type GenerationCompletedEvent = EventEnvelope<
  'engine/generation-completed',
  {
    readonly density: number;
    readonly placedWordCount: number;
    readonly unplacedWordCount: number;
    readonly trialsRun: number;
    readonly cancelled: boolean;
    readonly durationMs: number;
  }
>;

export type GenerationCancelledEvent = EventEnvelope<
  'engine/generation-cancelled',
  { readonly trialsRun: number; readonly durationMs: number }
>;

export type GenerationRejectedEvent = EventEnvelope<
  'engine/generation-rejected',
  { readonly code: string; readonly message: string }
>;

export type ApplicationEvent =
  | GenerationStartedEvent
  | UnitCompletedEvent
  | GenerationCompletedEvent
  | GenerationCancelledEvent
  | GenerationRejectedEvent;

export type ApplicationEventListener = (event: ApplicationEvent) => void;

export interface ApplicationEventBus {
  publish: (event: ApplicationEvent) => void;
  subscribe: (listener: ApplicationEventListener) => () => void;
}

export interface ApplicationLayer {
  readonly commands: ApplicationCommandBus;
  readonly queries: ApplicationQueryBus;
  readonly readModel: ApplicationReadModel;
  readonly events: ApplicationEventBus;
}

export interface ApplicationLayerOptions {
  readonly now?: () => number;
}
