/**
 * blockquery — Block query compiler
 *
 * Compiles a query string into a Predicate tree.
 *
 * Grammar:
 *   query     = segment ("," segment)*
 *   segment   = token*
 *   token     = "!"? (bareId | "%" name | "$" name | "~" name | "@" name | "[" propList "]")
 *   propList  = propItem ("," propItem)*
 *   propItem  = (name "=")? value ("|" value)*
 *   bareId    = [A-Za-z0-9_:]+
 *   name      = [A-Za-z0-9_]+
 *
 * Segments are OR-ed, tokens within a segment are AND-ed, and "!"
 * negates the single token that follows it. An empty segment has no
 * conditions and matches everything.
 */

import { splitSegments, splitPropertyGroup, tokenizeSegment } from './tokenizer.js';
import { CombinatorBuilder, byIdentity, byMaterialTag, byProperty, byTypeTag, not } from './builder.js';
import {
  DEFAULT_PROPERTY_NAME,
  QuerySyntaxError,
  UnknownIdentifierError,
  UnknownMaterialError,
  UnknownPredefinedQueryError,
  UnknownTypeTagError,
} from './types.js';
import type { CompileContext, Predicate, Token } from './types.js';

/** `name=value|value` or a bare `value|value` */
const PROPERTY_ITEM_PATTERN = /^(?:([A-Za-z0-9_]+)\s*=\s*)?([A-Za-z0-9_]+(?:\|[A-Za-z0-9_]+)*)$/;

/**
 * Compile a query string into a Predicate.
 *
 * @param spec - Query text, e.g. `"grass,dirt !~water"`
 * @param context - Name resolver, predefined query lookup and options
 * @returns The compiled predicate (single segments / tokens are not wrapped)
 * @throws QuerySyntaxError on malformed input
 * @throws UnknownIdentifierError, UnknownTypeTagError, UnknownMaterialError,
 *   UnknownPredefinedQueryError when a name does not resolve
 */
export function compile(spec: string, context: CompileContext): Predicate {
  const compiler = new SegmentCompiler(context);
  const anyOf = new CombinatorBuilder('or');
  for (const segment of splitSegments(spec)) {
    anyOf.add(compiler.compileSegment(segment));
  }
  return anyOf.build();
}

class SegmentCompiler {
  private readonly context: CompileContext;
  private readonly defaultPropertyName: string;

  constructor(context: CompileContext) {
    this.context = context;
    this.defaultPropertyName = context.defaultPropertyName ?? DEFAULT_PROPERTY_NAME;
  }

  /** segment = token* — tokens are combined with AND. */
  compileSegment(segment: string): Predicate {
    const tokens = tokenizeSegment(segment);
    const allOf = new CombinatorBuilder('and');
    let negated = false;
    let negation: Token | undefined;

    for (const token of tokens) {
      if (token.kind === 'NOT') {
        if (negated) {
          throw new QuerySyntaxError(segment, segment.slice(token.offset), "repeated '!'");
        }
        negated = true;
        negation = token;
        continue;
      }
      const predicate = this.compileToken(token, segment);
      allOf.add(negated ? not(predicate) : predicate);
      negated = false;
      negation = undefined;
    }

    if (negation !== undefined) {
      throw new QuerySyntaxError(segment, segment.slice(negation.offset), "'!' must precede a term");
    }

    return allOf.build();
  }

  private compileToken(token: Token, segment: string): Predicate {
    const { resolver, predefined } = this.context;

    switch (token.kind) {
      case 'TYPE_TAG':
      case 'STRICT_TYPE_TAG': {
        const tag = resolver.resolveTypeTag(token.value);
        if (tag === undefined) {
          throw new UnknownTypeTagError(token.value, segment);
        }
        return byTypeTag(tag, token.kind === 'STRICT_TYPE_TAG');
      }
      case 'MATERIAL': {
        const material = resolver.resolveMaterialTag(token.value);
        if (material === undefined) {
          throw new UnknownMaterialError(token.value, segment);
        }
        return byMaterialTag(material);
      }
      case 'REFERENCE': {
        const stored = predefined.lookup(token.value);
        if (stored === undefined) {
          throw new UnknownPredefinedQueryError(token.value, segment);
        }
        return stored;
      }
      case 'PROPERTY_GROUP':
        return this.compilePropertyGroup(token, segment);
      case 'IDENT': {
        const identifier = resolver.resolveIdentifier(token.value);
        if (identifier === undefined) {
          throw new UnknownIdentifierError(token.value, segment);
        }
        return byIdentity(identifier);
      }
      case 'NOT':
        throw new QuerySyntaxError(segment, segment.slice(token.offset), "repeated '!'");
    }
  }

  /** `[a=x|y, b=z]` → byProperty(a, {x, y}) AND byProperty(b, {z}) */
  private compilePropertyGroup(token: Token, segment: string): Predicate {
    const allOf = new CombinatorBuilder('and');
    for (const item of splitPropertyGroup(token.value)) {
      const m = PROPERTY_ITEM_PATTERN.exec(item);
      if (m === null) {
        throw new QuerySyntaxError(
          segment,
          segment.slice(token.offset),
          `invalid property item '${item}'`,
        );
      }
      const name = m[1] ?? this.defaultPropertyName;
      allOf.add(byProperty(name, m[2].split('|')));
    }
    return allOf.build();
  }
}
