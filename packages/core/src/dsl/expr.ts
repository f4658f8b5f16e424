/**
 * packages/core/src/dsl/expr.ts — Cached parse entrypoints.
 *
 * Why: Layout templates resubmit the same constraint sources on every pass; parsing
 * them once keeps repeated `addConstraintSource` calls cheap. Parsed trees are frozen
 * and unbound, so one cached tree serves every engine.
 */

import { type SourceNode, type SourceRelation, parseExpression, parseRelation } from "./parser.js";

const PARSE_CACHE_MAX = 256;
const EXPRESSION_CACHE = new Map<string, SourceNode>();
const RELATION_CACHE = new Map<string, SourceRelation>();

function remember<V>(cache: Map<string, V>, source: string, value: V): V {
  cache.set(source, value);
  while (cache.size > PARSE_CACHE_MAX) {
    const oldest = cache.keys().next().value;
    if (typeof oldest !== "string") break;
    cache.delete(oldest);
  }
  return value;
}

function recall<V>(cache: Map<string, V>, source: string): V | undefined {
  const cached = cache.get(source);
  if (cached === undefined) return undefined;
  // Refresh simple LRU access order.
  cache.delete(source);
  cache.set(source, cached);
  return cached;
}

export function expressionSource(source: string): SourceNode {
  return recall(EXPRESSION_CACHE, source) ?? remember(EXPRESSION_CACHE, source, parseExpression(source));
}

export function relationSource(source: string): SourceRelation {
  return recall(RELATION_CACHE, source) ?? remember(RELATION_CACHE, source, parseRelation(source));
}

export function clearParseCache(): void {
  EXPRESSION_CACHE.clear();
  RELATION_CACHE.clear();
}

export function getParseCacheSize(): number {
  return EXPRESSION_CACHE.size + RELATION_CACHE.size;
}
