/**
 * Query AST
 */

export type PresetName = 'privesc' | 'connected' | 'admin';

export const PRESET_NAMES: readonly PresetName[] = ['admin', 'connected', 'privesc'];

interface QueryBase {
  /** Depth bound given with `depth N`; overrides the engine default */
  depth?: number | undefined;
}

/**
 * preset privesc [selector]
 */
export interface PrivescQuery extends QueryBase {
  kind: 'preset';
  preset: 'privesc';
  selector: string;
}

/**
 * preset connected <selector> [selector]
 */
export interface ConnectedQuery extends QueryBase {
  kind: 'preset';
  preset: 'connected';
  source: string;
  target: string;
}

/**
 * preset admin [selector]
 */
export interface AdminQuery extends QueryBase {
  kind: 'preset';
  preset: 'admin';
  selector: string;
}

export type PresetQuery = PrivescQuery | ConnectedQuery | AdminQuery;

/**
 * can <principal> do <action> [with <resource>]
 */
export interface CanDoQuery extends QueryBase {
  kind: 'can-do';
  principal: string;
  action: string;
  resource: string;
}

/**
 * can <principal> reach <principal>
 */
export interface CanReachQuery extends QueryBase {
  kind: 'can-reach';
  source: string;
  target: string;
}

/**
 * who can do <action> [with <resource>]
 */
export interface WhoCanDoQuery extends QueryBase {
  kind: 'who-can-do';
  action: string;
  resource: string;
}

export type QueryAst = PresetQuery | CanDoQuery | CanReachQuery | WhoCanDoQuery;

/**
 * Short name of the query form, used in results
 */
export function queryKind(ast: QueryAst): string {
  return ast.kind === 'preset' ? `preset ${ast.preset}` : ast.kind;
}
