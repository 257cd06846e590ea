/**
 * Text formatting for command output
 */

import chalk from 'chalk';
import type {
  GraphStats,
  GraphWarning,
  PrincipalGraph,
  QueryPath,
  QueryResult,
  SnapshotMetadata,
} from 'iamgraph-core';

function displayName(graph: PrincipalGraph, arn: string): string {
  return graph.getNode(arn)?.searchableName ?? arn;
}

/**
 * One line per path: "user/alice -[rule]-> role/A -[rule]-> role/Admin".
 * A zero-edge path is just the principal.
 */
export function formatPath(path: QueryPath, graph: PrincipalGraph): string {
  let line = chalk.cyan(displayName(graph, path.source));
  for (const edge of path.edges) {
    line += ` ${chalk.gray(`-[${edge.label.ruleId}]->`)} ${chalk.cyan(displayName(graph, edge.target))}`;
  }
  return line;
}

export function formatQueryResult(result: QueryResult, graph: PrincipalGraph): string[] {
  if (result.paths.length === 0) {
    return [chalk.yellow('No matching paths.')];
  }

  const lines: string[] = [];
  for (const path of result.paths) {
    lines.push(formatPath(path, graph));
    for (const edge of path.edges) {
      for (const precondition of edge.label.preconditions) {
        lines.push(chalk.gray(`    ${edge.label.ruleId}: ${precondition}`));
      }
    }
  }
  if (result.truncated) {
    lines.push(chalk.yellow(`Results truncated after ${result.paths.length} path(s).`));
  }
  return lines;
}

export function formatStats(stats: GraphStats): string[] {
  return [
    `Principals:  ${stats.nodes} (${stats.users} user(s), ${stats.roles} role(s), ${stats.groups} group(s))`,
    `Admins:      ${stats.admins}`,
    `Edges:       ${stats.edges} (${stats.accessEdges} access, ${stats.escalationEdges} escalation, ${stats.selfEscalations} self)`,
    `Warnings:    ${stats.warnings}`,
  ];
}

export function formatMetadata(metadata: SnapshotMetadata): string[] {
  return [
    `Profile:     ${metadata.profile}`,
    `Account:     ${metadata.accountId}`,
    `Generated:   ${metadata.generatedAt}`,
    `Version:     ${metadata.toolVersion}`,
    `Rules:       ${metadata.ruleIds.length}`,
  ];
}

/**
 * Warning summary printed after a successful run. Lists at most `limit`
 * warnings.
 */
export function formatWarningSummary(warnings: readonly GraphWarning[], limit = 10): string[] {
  if (warnings.length === 0) return [];

  const partial = warnings.filter(warning => warning.kind === 'partial-ingestion').length;
  const dangling = warnings.length - partial;
  const lines = [
    chalk.yellow(`${warnings.length} warning(s): ${partial} partial ingestion, ${dangling} dangling reference`),
  ];
  for (const warning of warnings.slice(0, limit)) {
    lines.push(chalk.yellow(`  - ${warning.message}`));
  }
  if (warnings.length > limit) {
    lines.push(chalk.gray(`  ... and ${warnings.length - limit} more`));
  }
  return lines;
}
