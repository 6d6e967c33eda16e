/**
 * Filter expression builder.
 *
 * Turns listing query parameters into a backend filter expression: an AND
 * of clauses, one per non-empty parameter. Attribute names go through the
 * same sanitizer as the attribute encoder so that a filter always names the
 * attributes a write produced.
 */

import { NAME_ATTRIBUTE } from '../domain/document';
import { LAST_UPDATE_EPOCH_ATTRIBUTE, encodeAttributeName } from './attributes';
import { logger } from '../logger';

const log = logger.child({ module: 'filter' });

/** `key~=value`, `key!=value`, `key=value`; the operator is the first one found. */
const LABEL_PARSING_REGEX = /^(.+?)(~=|!=|=)(.+)$/;

export interface RunFilterParams {
  /** Raw `key[op]value` label predicates. */
  labels?: string[];
  name?: string;
  state?: string;
  /** Only runs whose last update is strictly later (epoch nanoseconds). */
  updatedAfter?: bigint;
}

export interface ArtifactFilterParams {
  labels?: string[];
  name?: string;
  /** Already resolved: undefined means no tag clause. */
  tag?: string;
}

/** Single-quoted string literal with `\` and `'` escaped. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Compile one label predicate. Without an operator the token is a label
 * name and the clause tests that the label exists.
 */
export function parseLabelPredicate(labelPrefix: string, text: string): string {
  const prefix = labelPrefix ? `${labelPrefix}.` : '';
  const match = LABEL_PARSING_REGEX.exec(text);
  if (!match) {
    return `exists(${encodeAttributeName(prefix + text)})`;
  }

  const [, label, op, comparand] = match;
  const attribute = encodeAttributeName(prefix + label);
  switch (op) {
    case '~=':
      return `contains(${attribute}, ${quoteLiteral(comparand)})`;
    case '!=':
      return `${attribute} != ${quoteLiteral(comparand)}`;
    default:
      return `${attribute} == ${quoteLiteral(comparand)}`;
  }
}

function labelClauses(labelPrefix: string, labels?: string[]): string[] {
  return (labels ?? []).filter((label) => label !== '').map((label) => parseLabelPredicate(labelPrefix, label));
}

export function buildRunFilter(labelPrefix: string, params: RunFilterParams): string {
  const clauses: string[] = [];
  if (params.name) {
    clauses.push(`${encodeAttributeName('metadata.name')} == ${quoteLiteral(params.name)}`);
  }
  if (params.state) {
    clauses.push(`${encodeAttributeName('status.state')} == ${quoteLiteral(params.state)}`);
  }
  clauses.push(...labelClauses(labelPrefix, params.labels));
  if (params.updatedAfter !== undefined && params.updatedAfter > 0n) {
    clauses.push(`${LAST_UPDATE_EPOCH_ATTRIBUTE} > ${params.updatedAfter.toString()}`);
  }

  const filter = clauses.join(' AND ');
  log.debug('Run filter built', { filter });
  return filter;
}

/**
 * The tag clause matches the item name suffix: tag records are stored as
 * `<key>.<tag>`, content records as `<key>.<uid>`.
 */
export function buildArtifactFilter(labelPrefix: string, params: ArtifactFilterParams): string {
  const clauses: string[] = [];
  if (params.name) {
    clauses.push(`${encodeAttributeName('name')} == ${quoteLiteral(params.name)}`);
  }
  if (params.tag) {
    clauses.push(`ends(${NAME_ATTRIBUTE}, ${quoteLiteral(`.${params.tag}`)})`);
  }
  clauses.push(...labelClauses(labelPrefix, params.labels));

  const filter = clauses.join(' AND ');
  log.debug('Artifact filter built', { filter });
  return filter;
}
