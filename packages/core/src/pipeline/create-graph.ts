/**
 * createGraph - ingest, resolve, evaluate rules, build and persist
 *
 * Stages run in order; a fatal error in any of them stops the run and
 * nothing is persisted. Warnings from every stage end up on the graph.
 */

import { StorageError, throwIfAborted } from '../errors/errors.js';
import type { GraphWarning } from '../errors/warnings.js';
import { GraphBuilder } from '../graph/graph-builder.js';
import type { PrincipalGraph } from '../graph/principal-graph.js';
import type { GraphStats } from '../graph/types.js';
import type { IdentitySource, IngestionStats, Principal } from '../ingestion/types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { toResolvedPrincipal } from '../resolver/permission-resolver.js';
import { ResolutionCache, type ResolutionCacheStats } from '../resolver/resolution-cache.js';
import type { ResolvedPrincipal } from '../resolver/types.js';
import { createAccountView } from '../rules/account-view.js';
import { createDefaultRuleRegistry, type RuleRegistry } from '../rules/registry.js';
import { RuleEngine, type RuleEngineStats } from '../rules/rule-engine.js';
import type { GraphStore } from '../store/graph-store.js';
import type { SnapshotMetadata } from '../store/schema.js';
import { VERSION } from '../version.js';

// ============================================================================
// Types
// ============================================================================

export interface CreateGraphOptions {
  profile: string;
  source: IdentitySource;
  /** Where to persist the snapshot; omitted means build only */
  store?: GraphStore | undefined;
  logger?: Logger | undefined;
  registry?: RuleRegistry | undefined;
  concurrency?: number | undefined;
  signal?: AbortSignal | undefined;
  /** Clock for generatedAt */
  now?: (() => Date) | undefined;
}

export interface CreateGraphStats {
  ingestion: IngestionStats;
  rules: RuleEngineStats;
  graph: GraphStats;
  cache: ResolutionCacheStats;
}

export interface CreateGraphResult {
  graph: PrincipalGraph;
  metadata: SnapshotMetadata;
  warnings: readonly GraphWarning[];
  stats: CreateGraphStats;
  /** Snapshot file, when a store was given */
  snapshotPath?: string | undefined;
}

// ============================================================================
// Stages
// ============================================================================

/**
 * Resolve every principal; users inherit the policies of their groups
 */
export function resolvePrincipals(principals: readonly Principal[], cache: ResolutionCache): ResolvedPrincipal[] {
  const byArn = new Map(principals.map(principal => [principal.arn, principal]));

  return principals.map(principal => {
    const groups = principal.type === 'user'
      ? principal.groupArns.flatMap(arn => {
          const group = byArn.get(arn);
          return group ? [group] : [];
        })
      : [];
    return toResolvedPrincipal(principal, cache.resolve(principal, groups));
  });
}

async function loadPreviousCache(
  store: GraphStore | undefined,
  profile: string,
  accountId: string,
  logger: Logger
): Promise<ResolutionCache> {
  if (!store) return new ResolutionCache();
  try {
    const previous = await store.tryLoad(profile, accountId);
    return new ResolutionCache(previous?.resolutionCache ?? []);
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    logger.warn(`Ignoring previous snapshot: ${error.message}`);
    return new ResolutionCache();
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export async function createGraph(options: CreateGraphOptions): Promise<CreateGraphResult> {
  const logger = options.logger ?? silentLogger;
  const registry = options.registry ?? createDefaultRuleRegistry();
  const { signal, store, profile, source } = options;

  try {
    throwIfAborted(signal, 'ingestion');
    logger.info(`Ingesting identities from ${source.describe()}`);
    const ingestion = await source.ingest({ logger, signal, concurrency: options.concurrency });
    const { account } = ingestion;

    throwIfAborted(signal, 'permission resolution');
    const cache = await loadPreviousCache(store, profile, account.accountId, logger);
    const resolved = resolvePrincipals(account.principals, cache);
    cache.retain(resolved.map(entry => entry.permissions));
    const cacheStats = cache.getStats();
    logger.debug(`Resolution cache: ${cacheStats.hits} hit(s), ${cacheStats.misses} miss(es)`);

    throwIfAborted(signal, 'rule evaluation');
    const engine = new RuleEngine(registry);
    const ruleResult = await engine.evaluate(resolved, createAccountView(account, resolved), {
      concurrency: options.concurrency,
      signal,
      logger,
    });

    throwIfAborted(signal, 'graph build');
    const builder = new GraphBuilder({ logger })
      .addPrincipals(resolved)
      .addResources({ functions: account.functions, instanceProfiles: account.instanceProfiles })
      .addWarnings(ingestion.warnings);
    builder.addEdges(ruleResult.edges);
    const graph = builder.build();

    const metadata: SnapshotMetadata = {
      accountId: account.accountId,
      profile,
      generatedAt: (options.now ?? (() => new Date()))().toISOString(),
      toolVersion: VERSION,
      ruleIds: registry.ids(),
    };

    throwIfAborted(signal, 'persistence');
    const snapshotPath = store
      ? await store.save({ metadata, graph, resolutionCache: cache.values() })
      : undefined;

    const stats: CreateGraphStats = {
      ingestion: ingestion.stats,
      rules: ruleResult.stats,
      graph: graph.stats(),
      cache: cacheStats,
    };
    logger.info(
      `Graph for account ${account.accountId}: ${stats.graph.nodes} node(s), ${stats.graph.edges} edge(s), ${stats.graph.warnings} warning(s)`
    );

    return { graph, metadata, warnings: graph.warnings(), stats, snapshotPath };
  } finally {
    source.close?.();
  }
}
