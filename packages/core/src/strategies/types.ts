import type { RequestView } from '../request-view.js';

export const STRATEGY_KINDS = ['url_path', 'header', 'query_param', 'accept_header', 'composite'] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export const DEFAULT_STRATEGY_PRIORITY = 100;

/** A version token pulled out of one request facet, not yet parsed. */
export interface RawToken {
  readonly value: string;
  /** Where the token came from, e.g. `header:x-api-version`. */
  readonly source: string;
  readonly strategy: string;
}

export interface StrategyDescriptor {
  name: string;
  kind: StrategyKind;
  priority: number;
  enabled: boolean;
  parameters: Record<string, unknown>;
  strategies?: StrategyDescriptor[];
}

export interface ExtractionStrategy {
  readonly kind: StrategyKind;
  readonly name: string;
  readonly priority: number;
  readonly enabled: boolean;
  extract(request: RequestView): RawToken | null;
  describe(): StrategyDescriptor;
}

interface BaseStrategyOptions {
  name?: string;
  /** Lower runs first. */
  priority?: number;
  enabled?: boolean;
}

export interface UrlPathStrategyOptions extends BaseStrategyOptions {
  kind: 'url_path';
  prefix?: string;
  apiPrefix?: string;
}

export interface HeaderStrategyOptions extends BaseStrategyOptions {
  kind: 'header';
  header?: string;
  alternatives?: string[];
  /** Sub-field to read when the header carries `key=value` pairs. */
  field?: string;
}

export interface QueryParameterStrategyOptions extends BaseStrategyOptions {
  kind: 'query_param';
  param?: string;
  alternatives?: string[];
  caseSensitive?: boolean;
}

export interface AcceptHeaderStrategyOptions extends BaseStrategyOptions {
  kind: 'accept_header';
  parameter?: string;
  mediaType?: string;
  /** `true` enables the built-in vendor pattern; a string is a regex source with one capture group. */
  vendorPattern?: boolean | string;
}

export interface CompositeStrategyOptions extends BaseStrategyOptions {
  kind: 'composite';
  strategies: StrategyOptions[];
}

export type StrategyOptions =
  | UrlPathStrategyOptions
  | HeaderStrategyOptions
  | QueryParameterStrategyOptions
  | AcceptHeaderStrategyOptions
  | CompositeStrategyOptions;
