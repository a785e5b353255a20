import type {
  ApplicationCommand,
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationEventListener,
  ApplicationLayer,
  ApplicationLayerOptions,
  ApplicationQuery,
  ApplicationQueryBus,
  ApplicationReadModel,
  ApplicationResult,
  CommandOutcome,
  GeneratedCrossword,
} from './contracts';
import { EMPTY_CELL } from '../config/engine-defaults';
import { CrosswordEngineDomainError } from '../domain/engine-errors';
import {
  createExecutionSettings,
  validateWordList,
  type ExecutionSettings,
} from '../domain/engine-input';
import {
  createGridConfiguration,
  type CrosswordGrid,
  type GridConfiguration,
} from '../domain/Grid';
import { describeLayout } from '../domain/Layout';
import { runTrialUnits, type TrialUnitsResult } from '../domain/TrialSelector';
import { rankWords } from '../domain/WordRanker';
import { toErrorMessage } from '../shared/errors';

function assertNever(value: never): never {
  throw new Error(`Unsupported command: ${JSON.stringify(value)}`);
}

function createError(
  code: string,
  message: string,
  retryable: boolean,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationError {
  return { code, message, retryable, context };
}

function ok<TValue>(value: TValue): ApplicationResult<TValue> {
  return { type: 'ok', value };
}

function domainError<TValue>(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationResult<TValue> {
  return {
    type: 'domainError',
    error: createError(code, message, false, context),
  };
}

function infraError<TValue>(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationResult<TValue> {
  return {
    type: 'infraError',
    error: createError(code, message, true, context),
  };
}

type GenerateCrosswordCommand = Extract<ApplicationCommand, { type: 'GenerateCrossword' }>;

const EVENT_VERSIONS: Readonly<Record<ApplicationEvent['eventType'], number>> = {
  'engine/generation-started': 1,
  'engine/unit-completed': 1,
  'engine/generation-completed': 1,
  'engine/generation-cancelled': 1,
  'engine/generation-rejected': 1,
};

function collectUnplacedWords(words: readonly string[], grid: CrosswordGrid): readonly string[] {
  const placedWords = grid.placedWords();
  const unplaced: string[] = [];
  const seen = new Set<string>();

  for (const word of words) {
    if (placedWords.has(word) || seen.has(word)) {
      continue;
    }

    seen.add(word);
    unplaced.push(word);
  }

  return unplaced;
}

function toGeneratedCrossword(
  words: readonly string[],
  config: GridConfiguration,
  grid: CrosswordGrid,
  meta: GeneratedCrossword['meta'],
): GeneratedCrossword {
  return {
    width: config.width,
    height: config.height,
    wrap: config.wrap,
    cells: [...grid.cells],
    rows: grid.rows(EMPTY_CELL),
    placements: grid.placements,
    placedWords: grid.placements.map((placement) => placement.word),
    unplacedWords: collectUnplacedWords(words, grid),
    density: grid.density(),
    layout: describeLayout(grid),
    meta,
  };
}

interface ParsedGenerationInput {
  readonly type: 'parsed';
  readonly config: GridConfiguration;
  readonly execution: ExecutionSettings;
  readonly words: readonly string[];
}

interface RejectedGenerationInput {
  readonly type: 'rejected';
  readonly error: CrosswordEngineDomainError;
}

function parseGenerationInput(
  command: GenerateCrosswordCommand,
): ParsedGenerationInput | RejectedGenerationInput {
  try {
    return {
      type: 'parsed',
      config: createGridConfiguration(command.configuration),
      execution: createExecutionSettings(command.execution),
      words: validateWordList(command.words),
    };
  } catch (error: unknown) {
    if (error instanceof CrosswordEngineDomainError) {
      return { type: 'rejected', error };
    }

    throw error;
  }
}

export function createApplicationLayer(options: ApplicationLayerOptions = {}): ApplicationLayer {
  const now = options.now ?? Date.now;
  const eventListeners = new Set<ApplicationEventListener>();
  let eventSequence = 0;
  let correlationSequence = 0;
  let lastGeneration: GeneratedCrossword | null = null;

  const publish = (event: ApplicationEvent): void => {
    eventListeners.forEach((listener) => {
      listener(event);
    });
  };

  const eventBus: ApplicationEventBus = {
    publish,
    subscribe: (listener) => {
      eventListeners.add(listener);
      return () => {
        eventListeners.delete(listener);
      };
    },
  };

  const resolveCorrelationId = (
    commandType: ApplicationCommand['type'],
    correlationId: string | null | undefined,
  ): string => {
    if (typeof correlationId === 'string') {
      const normalizedCorrelationId = correlationId.trim();
      if (normalizedCorrelationId.length > 0) {
        return normalizedCorrelationId;
      }
    }

    correlationSequence += 1;
    return `${commandType}-${now()}-${correlationSequence}`;
  };

  const envelope = (eventType: ApplicationEvent['eventType'], correlationId: string) => {
    const occurredAt = now();
    eventSequence += 1;
    return {
      eventId: `evt-${occurredAt}-${eventSequence}`,
      eventVersion: EVENT_VERSIONS[eventType],
      occurredAt,
      correlationId,
    };
  };

  const rejectGeneration = (
    correlationId: string,
    error: CrosswordEngineDomainError,
  ): ApplicationResult<CommandOutcome> => {
    publish({
      ...envelope('engine/generation-rejected', correlationId),
      eventType: 'engine/generation-rejected',
      payload: { code: error.code, message: error.message },
    });

    return domainError(error.code, error.message, error.context);
  };

  const generateCrossword = async (
    command: GenerateCrosswordCommand,
  ): Promise<ApplicationResult<CommandOutcome>> => {
    const correlationId = resolveCorrelationId(command.type, command.correlationId);
    const startedAt = now();

    const parsed = parseGenerationInput(command);
    if (parsed.type === 'rejected') {
      return rejectGeneration(correlationId, parsed.error);
    }

    const { config, execution, words } = parsed;

    publish({
      ...envelope('engine/generation-started', correlationId),
      eventType: 'engine/generation-started',
      payload: {
        wordCount: words.length,
        width: config.width,
        height: config.height,
        wrap: config.wrap,
        seed: execution.seed,
        unitCount: execution.unitCount,
        trialsPerUnit: execution.trialsPerUnit,
      },
    });

    const outcome: TrialUnitsResult = await runTrialUnits({
      words: rankWords(words),
      config,
      seed: execution.seed,
      trialsPerUnit: execution.trialsPerUnit,
      unitCount: execution.unitCount,
      initialPlacement: execution.initialPlacement,
      signal: command.signal,
      onUnitCompleted: (report) => {
        publish({
          ...envelope('engine/unit-completed', correlationId),
          eventType: 'engine/unit-completed',
          payload: report,
        });
      },
    });
    const durationMs = Math.max(0, now() - startedAt);

    if (!outcome.best) {
      publish({
        ...envelope('engine/generation-cancelled', correlationId),
        eventType: 'engine/generation-cancelled',
        payload: { trialsRun: outcome.trialsRun, durationMs },
      });

      return domainError(
        'engine.generation-cancelled',
        'Generation was cancelled before any trial completed.',
        { trialsRun: outcome.trialsRun },
      );
    }

    const crossword = toGeneratedCrossword(words, config, outcome.best.grid, {
      correlationId,
      seed: execution.seed,
      unitCount: execution.unitCount,
      trialsPerUnit: execution.trialsPerUnit,
      trialsRun: outcome.trialsRun,
      cancelled: outcome.cancelled,
      units: outcome.units,
    });

    lastGeneration = crossword;
    publish({
      ...envelope('engine/generation-completed', correlationId),
      eventType: 'engine/generation-completed',
      payload: {
        density: crossword.density,
        placedWordCount: crossword.placedWords.length,
        unplacedWordCount: crossword.unplacedWords.length,
        trialsRun: outcome.trialsRun,
        cancelled: outcome.cancelled,
        durationMs,
      },
    });

    return ok<CommandOutcome>({ type: 'CrosswordGenerated', crossword });
  };

  const commandBus = {
    dispatch: async (command: ApplicationCommand): Promise<ApplicationResult<CommandOutcome>> => {
      try {
        switch (command.type) {
          case 'GenerateCrossword': {
            return await generateCrossword(command);
          }
          case 'RankWords': {
            return ok<CommandOutcome>({
              type: 'WordsRanked',
              words: rankWords(validateWordList(command.words)),
            });
          }
          default: {
            return assertNever(command);
          }
        }
      } catch (error: unknown) {
        if (error instanceof CrosswordEngineDomainError) {
          return domainError(error.code, error.message, error.context);
        }

        return infraError('engine.generation-failed', 'Command handler crashed.', {
          commandType: command.type,
          reason: toErrorMessage(error),
        });
      }
    },
  };

  const queryBus: ApplicationQueryBus = {
    execute: (query: ApplicationQuery) => {
      switch (query.type) {
        case 'GetLastGeneration': {
          return ok(lastGeneration);
        }
        default: {
          return assertNever(query.type);
        }
      }
    },
  };

  const readModel: ApplicationReadModel = {
    getLastGeneration: () => {
      const queryResult = queryBus.execute({ type: 'GetLastGeneration' });

      if (queryResult.type !== 'ok') {
        throw new Error(
          `[application/read-model] Failed to resolve GetLastGeneration: ${queryResult.error.code}`,
        );
      }

      return queryResult.value;
    },
  };

  return {
    commands: commandBus,
    queries: queryBus,
    readModel,
    events: eventBus,
  };
}

export type {
  ApplicationCommand,
  ApplicationCommandBus,
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationLayer,
  ApplicationLayerOptions,
  ApplicationQuery,
  ApplicationQueryBus,
  ApplicationReadModel,
  ApplicationResult,
  CommandOutcome,
  ExecutionRequest,
  GeneratedCrossword,
  GenerationMeta,
  GridConfigurationRequest,
} from './contracts';
