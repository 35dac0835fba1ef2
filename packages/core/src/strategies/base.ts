import type { RequestView } from '../request-view.js';
import {
  DEFAULT_STRATEGY_PRIORITY,
  type ExtractionStrategy,
  type RawToken,
  type StrategyDescriptor,
  type StrategyKind
} from './types.js';

export abstract class BaseStrategy implements ExtractionStrategy {
  abstract readonly kind: StrategyKind;
  readonly name: string;
  readonly priority: number;
  readonly enabled: boolean;

  protected constructor(defaultName: string, options: { name?: string; priority?: number; enabled?: boolean }) {
    this.name = options.name ?? defaultName;
    this.priority = options.priority ?? DEFAULT_STRATEGY_PRIORITY;
    this.enabled = options.enabled ?? true;
  }

  abstract extract(request: RequestView): RawToken | null;

  protected abstract parameters(): Record<string, unknown>;

  describe(): StrategyDescriptor {
    return {
      name: this.name,
      kind: this.kind,
      priority: this.priority,
      enabled: this.enabled,
      parameters: this.parameters()
    };
  }

  protected token(value: string, source: string): RawToken {
    return { value, source, strategy: this.name };
  }
}

/** Stable sort: equal priorities keep their configured order. */
export function byPriority<T extends { priority: number }>(strategies: readonly T[]): T[] {
  return [...strategies].sort((left, right) => left.priority - right.priority);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
