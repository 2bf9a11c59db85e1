/**
 * Translation Coordinator - drives translate requests to completion
 *
 * Each request runs reading → translating → merging → writing and then
 * settles exactly once, as `completed` (one `changed` notification) or
 * `failed` (one `failed` notification carrying the cause).
 *
 * Requests own their inputs and table snapshot. Concurrent requests do not
 * block each other; overlapping writes are last-write-wins.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';

import type { BundleStore } from '../bundle/bundle-store.js';
import { uniqueLanguages } from '../bundle/bundle-store.js';
import { LOG_SOURCES } from '../constants.js';
import { LocalizationError } from '../errors.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import { TranslationTable } from '../table/translation-table.js';
import type {
  LanguageKey,
  TranslationKey,
  TranslationService,
  Unsubscribe,
} from '../types/index.js';
import { toError } from '../utils/error-handler.js';

export type TranslationState =
  | 'idle'
  | 'reading'
  | 'translating'
  | 'merging'
  | 'writing'
  | 'completed'
  | 'failed';

/** Allowed transitions; anything else is a programming error */
const TRANSITIONS: Record<TranslationState, readonly TranslationState[]> = {
  idle: ['reading', 'failed'],
  reading: ['translating', 'failed'],
  translating: ['merging', 'failed'],
  merging: ['writing', 'failed'],
  writing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface StateTransition {
  state: TranslationState;
  at: number;
}

export interface TranslationRequest {
  readonly id: string;
  readonly texts: readonly TranslationKey[];
  readonly from: LanguageKey;
  readonly to: readonly LanguageKey[];
  /** `to` plus `from` */
  readonly allLanguages: readonly LanguageKey[];
  state: TranslationState;
  readonly history: StateTransition[];
  readonly startedAt: number;
  finishedAt?: number;
  /** Root written by a completed request */
  root?: string;
  error?: unknown;
}

export interface StateChangeEvent {
  request: TranslationRequest;
  from: TranslationState;
  to: TranslationState;
}

export interface TranslationCoordinatorOptions {
  store: BundleStore;
  translationService?: TranslationService;
  disabled?: boolean;
}

/**
 * Compute target languages: explicit `to` de-duplicated and without
 * `from`, or every supported language except `from`.
 */
export function resolveTargets(
  from: LanguageKey,
  to: readonly LanguageKey[] | undefined,
  supported: readonly LanguageKey[]
): LanguageKey[] {
  return uniqueLanguages(to ?? supported).filter(language => language !== from);
}

export class TranslationCoordinator {
  translationService: TranslationService | undefined;
  disabled: boolean;

  private readonly store: BundleStore;
  private readonly emitter = new EventEmitter();
  private readonly pending = new Set<TranslationRequest>();
  private idleWaiters: Array<() => void> = [];
  private readonly logger = getUnifiedLogger();

  constructor(options: TranslationCoordinatorOptions) {
    this.store = options.store;
    this.translationService = options.translationService;
    this.disabled = options.disabled ?? false;
    this.emitter.setMaxListeners(50);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Requests that have not settled yet
   */
  pendingRequests(): TranslationRequest[] {
    return [...this.pending];
  }

  /**
   * Translate `texts` from `from` into `to` (default: every other supported
   * language), merge into the stored table and persist it.
   *
   * Resolves with the completed request. Rejects with the failure cause;
   * translation service errors are passed through unchanged.
   */
  async translate(
    texts: readonly TranslationKey[],
    from: LanguageKey,
    to?: readonly LanguageKey[]
  ): Promise<TranslationRequest> {
    if (this.disabled) {
      throw LocalizationError.disabled();
    }

    const targets = resolveTargets(from, to, this.store.languages);
    const request: TranslationRequest = {
      id: randomUUID(),
      texts: [...texts],
      from,
      to: targets,
      allLanguages: [...targets, from],
      state: 'idle',
      history: [{ state: 'idle', at: Date.now() }],
      startedAt: Date.now(),
    };

    this.pending.add(request);
    this.logger.debug(LOG_SOURCES.COORDINATOR, 'Translation requested', {
      id: request.id,
      texts: request.texts.length,
      from,
      to: targets,
    });

    try {
      await this.run(request);
      this.complete(request);
      return request;
    } catch (error) {
      this.fail(request, error);
      throw error;
    } finally {
      this.pending.delete(request);
      this.notifyIdle();
    }
  }

  private async run(request: TranslationRequest): Promise<void> {
    this.transition(request, 'reading');
    const snapshot = await this.store.load(request.allLanguages);

    const service = this.translationService;
    if (!service) {
      throw LocalizationError.noTranslationService();
    }

    this.transition(request, 'translating');
    const translated = await service.translate(
      [...request.texts],
      request.from,
      [...request.to],
      snapshot.clone()
    );
    if (!(translated instanceof TranslationTable)) {
      throw new TypeError('Translation service resolved with something other than a TranslationTable');
    }

    // Re-read: the stored table may have changed while the service ran
    this.transition(request, 'merging');
    const current = await this.store.load(request.allLanguages);
    current.merge(translated.pick(request.allLanguages));

    this.transition(request, 'writing');
    request.root = await this.store.writeAtomic(current, request.allLanguages);
  }

  private transition(request: TranslationRequest, next: TranslationState): void {
    const previous = request.state;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid translation state transition ${previous} → ${next}`);
    }
    request.state = next;
    request.history.push({ state: next, at: Date.now() });
    this.emitter.emit('state', { request, from: previous, to: next });
  }

  private complete(request: TranslationRequest): void {
    this.transition(request, 'completed');
    request.finishedAt = Date.now();
    this.logger.info(LOG_SOURCES.COORDINATOR, 'Translation completed', {
      id: request.id,
      root: request.root,
      durationMs: request.finishedAt - request.startedAt,
    });
    this.emitter.emit('changed');
  }

  private fail(request: TranslationRequest, error: unknown): void {
    if (request.state === 'completed' || request.state === 'failed') {
      return;
    }
    request.error = error;
    this.transition(request, 'failed');
    request.finishedAt = Date.now();
    this.logger.error(LOG_SOURCES.COORDINATOR, 'Translation failed', toError(error), {
      id: request.id,
      stage: request.history[request.history.length - 2]?.state,
    });
    this.emitter.emit('failed', error);
  }

  private notifyIdle(): void {
    if (this.pending.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /**
   * Resolves once no request is in flight
   */
  waitForIdle(): Promise<void> {
    if (this.pending.size === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  // ── Observers ────────────────────────────────────────────────────────────

  private subscribe<A extends unknown[]>(event: string, callback: (...args: A) => void): Unsubscribe {
    const guarded = (...args: A): void => {
      try {
        callback(...args);
      } catch (error) {
        this.logger.error(LOG_SOURCES.COORDINATOR, `Observer threw on "${event}"`, toError(error));
      }
    };
    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  /** Fires once per committed write */
  onChange(callback: () => void): Unsubscribe {
    return this.subscribe('changed', callback);
  }

  /** Fires once per failed request with its cause */
  onFailure(callback: (error: unknown) => void): Unsubscribe {
    return this.subscribe('failed', callback);
  }

  onStateChange(callback: (event: StateChangeEvent) => void): Unsubscribe {
    return this.subscribe('state', callback);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
