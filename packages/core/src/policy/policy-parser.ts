/**
 * Policy Parser
 *
 * Turns raw policy JSON (string, URL-encoded string or object) into the
 * normalised PolicyDocument model. Validation is done with zod; every
 * failure is reported as a ParseError naming the document and statement.
 */

import { z } from 'zod';

import { ParseError } from '../errors/errors.js';
import type {
  ConditionBlock,
  PolicyDocument,
  PolicyKind,
  PolicyPrincipal,
  PolicyStatement,
} from './types.js';

// ============================================================================
// Raw Schemas
// ============================================================================

const stringOrList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const conditionValue = z.union([z.string(), z.number(), z.boolean()]);

const RawPrincipalSchema = z.union([
  z.literal('*'),
  z
    .object({
      AWS: stringOrList.optional(),
      Service: stringOrList.optional(),
      Federated: stringOrList.optional(),
      CanonicalUser: stringOrList.optional(),
    })
    .strict(),
]);

const RawStatementSchema = z
  .object({
    Sid: z.string().optional(),
    Effect: z.enum(['Allow', 'Deny']),
    Action: stringOrList.optional(),
    NotAction: stringOrList.optional(),
    Resource: stringOrList.optional(),
    NotResource: stringOrList.optional(),
    Principal: RawPrincipalSchema.optional(),
    NotPrincipal: RawPrincipalSchema.optional(),
    Condition: z
      .record(z.record(z.union([conditionValue, z.array(conditionValue)])))
      .optional(),
  })
  .strict();

const RawDocumentSchema = z.object({
  Version: z.string().optional(),
  Id: z.string().optional(),
  Statement: z.union([z.array(z.unknown()), z.record(z.unknown())]),
});

type RawStatement = z.infer<typeof RawStatementSchema>;
type RawPrincipal = z.infer<typeof RawPrincipalSchema>;

// ============================================================================
// Helpers
// ============================================================================

function toList(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? [...value] : [value];
}

function normalizePrincipal(raw: RawPrincipal | undefined): PolicyPrincipal | undefined {
  if (raw === undefined) return undefined;
  if (raw === '*') {
    return { wildcard: true, aws: ['*'], service: [], federated: [], canonicalUser: [] };
  }
  return {
    wildcard: false,
    aws: toList(raw.AWS) ?? [],
    service: toList(raw.Service) ?? [],
    federated: toList(raw.Federated) ?? [],
    canonicalUser: toList(raw.CanonicalUser) ?? [],
  };
}

function normalizeCondition(raw: RawStatement['Condition']): ConditionBlock {
  const block: ConditionBlock = {};
  if (!raw) return block;

  for (const [operator, keys] of Object.entries(raw)) {
    const normalizedKeys: Record<string, string[]> = {};
    for (const [key, value] of Object.entries(keys)) {
      const values = Array.isArray(value) ? value : [value];
      normalizedKeys[key] = values.map(v => String(v));
    }
    block[operator] = normalizedKeys;
  }
  return block;
}

function describeStatement(index: number, raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'Sid' in raw && typeof raw.Sid === 'string') {
    return `Statement[${index}] (${raw.Sid})`;
  }
  return `Statement[${index}]`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decode the input into a plain object. IAM returns documents URL-encoded.
 */
function decodeDocument(input: unknown, documentName: string): unknown {
  if (typeof input !== 'string') return input;

  let text = input.trim();
  if (!text.startsWith('{')) {
    try {
      text = decodeURIComponent(text);
    } catch {
      throw new ParseError(documentName, 'document', 'not valid JSON or URL-encoded JSON');
    }
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(documentName, 'document', `invalid JSON (${reason})`);
  }
}

// ============================================================================
// Parser
// ============================================================================

function normalizeStatement(
  raw: RawStatement,
  kind: PolicyKind,
  documentName: string,
  fragment: string
): PolicyStatement {
  if (raw.Action !== undefined && raw.NotAction !== undefined) {
    throw new ParseError(documentName, fragment, 'Action and NotAction are mutually exclusive');
  }
  if (raw.Resource !== undefined && raw.NotResource !== undefined) {
    throw new ParseError(documentName, fragment, 'Resource and NotResource are mutually exclusive');
  }
  if (raw.Principal !== undefined && raw.NotPrincipal !== undefined) {
    throw new ParseError(documentName, fragment, 'Principal and NotPrincipal are mutually exclusive');
  }
  if (raw.Action === undefined && raw.NotAction === undefined) {
    throw new ParseError(documentName, fragment, 'statement needs Action or NotAction');
  }

  if (kind === 'identity') {
    if (raw.Resource === undefined && raw.NotResource === undefined) {
      throw new ParseError(documentName, fragment, 'statement needs Resource or NotResource');
    }
    if (raw.Principal !== undefined || raw.NotPrincipal !== undefined) {
      throw new ParseError(documentName, fragment, 'identity policies cannot name a Principal');
    }
  } else if (raw.Principal === undefined && raw.NotPrincipal === undefined) {
    throw new ParseError(documentName, fragment, 'resource policy statement needs Principal or NotPrincipal');
  }

  return {
    sid: raw.Sid,
    effect: raw.Effect,
    action: toList(raw.Action),
    notAction: toList(raw.NotAction),
    resource: toList(raw.Resource),
    notResource: toList(raw.NotResource),
    principal: normalizePrincipal(raw.Principal),
    notPrincipal: normalizePrincipal(raw.NotPrincipal),
    condition: normalizeCondition(raw.Condition),
  };
}

/**
 * Parse and validate a policy document.
 *
 * @param input JSON text, URL-encoded JSON text, or an already decoded object
 * @param documentName Name used in error messages (policy name or ARN)
 * @param kind Identity policies need resources, resource policies need principals
 */
export function parsePolicyDocument(
  input: unknown,
  documentName: string,
  kind: PolicyKind = 'identity'
): PolicyDocument {
  const decoded = decodeDocument(input, documentName);

  const document = RawDocumentSchema.safeParse(decoded);
  if (!document.success) {
    throw new ParseError(documentName, 'document', formatIssues(document.error));
  }

  const rawStatements = Array.isArray(document.data.Statement)
    ? document.data.Statement
    : [document.data.Statement];

  if (rawStatements.length === 0) {
    throw new ParseError(documentName, 'Statement', 'document has no statements');
  }

  const statements = rawStatements.map((rawStatement, index) => {
    const fragment = describeStatement(index, rawStatement);
    const parsed = RawStatementSchema.safeParse(rawStatement);
    if (!parsed.success) {
      throw new ParseError(documentName, fragment, formatIssues(parsed.error));
    }
    return normalizeStatement(parsed.data, kind, documentName, fragment);
  });

  return {
    version: document.data.Version ?? '2008-10-17',
    statements,
  };
}

