/**
 * Non-fatal problems collected while building a graph.
 * They are reported after a successful run and never change the exit code.
 */

export type WarningKind = 'partial-ingestion' | 'dangling-reference';

export interface PartialIngestionWarning {
  kind: 'partial-ingestion';
  /** ARN of the principal whose data could not be fetched */
  principalArn: string;
  /** Provider operation that failed */
  operation: string;
  message: string;
}

export interface DanglingReferenceWarning {
  kind: 'dangling-reference';
  /** ARN of the record holding the reference */
  source: string;
  /** ARN that could not be found in the identity set */
  reference: string;
  message: string;
}

export type GraphWarning = PartialIngestionWarning | DanglingReferenceWarning;

export function createPartialIngestionWarning(
  principalArn: string,
  operation: string,
  reason: string
): PartialIngestionWarning {
  return {
    kind: 'partial-ingestion',
    principalArn,
    operation,
    message: `Skipped ${principalArn}: ${operation} failed (${reason})`,
  };
}

export function createDanglingReferenceWarning(
  source: string,
  reference: string,
  what: string
): DanglingReferenceWarning {
  return {
    kind: 'dangling-reference',
    source,
    reference,
    message: `${source} references unknown ${what} ${reference}`,
  };
}

/**
 * Identifier of the principal or record a warning is about
 */
export function warningSubject(warning: GraphWarning): string {
  return warning.kind === 'partial-ingestion' ? warning.principalArn : warning.source;
}
