/**
 * @module path/path-parser
 *
 * Parser for metadata path expressions using Chevrotain.
 *
 * ```
 * path    := segment ('/' segment)*
 * segment := type ':' name ('(' subType ')')?
 * ```
 */

import { CstParser, type CstNode, type IToken } from 'chevrotain';
import { ConfigurationError } from '../errors';
import type { TMetaDataPath, TPathSegment } from './meta-data-path';
import { Colon, Identifier, LParen, PathLexer, RParen, Slash, allTokens } from './tokens';

// =============================================================================
// Parser Definition
// =============================================================================

class MetaDataPathParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  public path = this.RULE('path', () => {
    this.SUBRULE(this.segment);
    this.MANY(() => {
      this.CONSUME(Slash);
      this.SUBRULE2(this.segment);
    });
  });

  public segment = this.RULE('segment', () => {
    this.CONSUME(Identifier, { LABEL: 'type' });
    this.CONSUME(Colon);
    this.CONSUME2(Identifier, { LABEL: 'name' });
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.CONSUME3(Identifier, { LABEL: 'subType' });
      this.CONSUME(RParen);
    });
  });
}

// =============================================================================
// Parser Instance (singleton)
// =============================================================================

const parserInstance = new MetaDataPathParser();

// =============================================================================
// CST Visitor
// =============================================================================

const BaseVisitor = parserInstance.getBaseCstVisitorConstructor();

interface PathContext {
  segment: CstNode[];
}

interface SegmentContext {
  type: IToken[];
  name: IToken[];
  subType?: IToken[];
}

class MetaDataPathVisitor extends BaseVisitor {
  constructor() {
    super();
    this.validateVisitor();
  }

  path(ctx: PathContext): TMetaDataPath {
    return ctx.segment.map((node) => {
      const segment: unknown = this.visit(node);
      if (!isPathSegment(segment)) {
        throw new ConfigurationError('Malformed path segment');
      }
      return segment;
    });
  }

  segment(ctx: SegmentContext): TPathSegment {
    const subType = ctx.subType?.[0]?.image;
    return {
      type: ctx.type[0].image,
      name: ctx.name[0].image,
      ...(subType ? { subType } : {}),
    };
  }
}

function isPathSegment(value: unknown): value is TPathSegment {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    'name' in value &&
    typeof value.type === 'string' &&
    typeof value.name === 'string'
  );
}

const visitorInstance = new MetaDataPathVisitor();

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse `object:acme::User/field:id(long)` into segments.
 * Throws ConfigurationError with the first lexer or parser error.
 */
export function parseMetaDataPath(input: string): TMetaDataPath {
  const lexResult = PathLexer.tokenize(input);
  if (lexResult.errors.length > 0) {
    const first = lexResult.errors[0];
    throw new ConfigurationError(
      `Invalid metadata path "${input}": unexpected character at column ${first.column ?? first.offset + 1}`,
      { path: input }
    );
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.path();
  if (parserInstance.errors.length > 0) {
    throw new ConfigurationError(
      `Invalid metadata path "${input}": ${parserInstance.errors[0].message}\n` +
        `  Expected format: type:name(subType)/type:name`,
      { path: input }
    );
  }

  const result: unknown = visitorInstance.visit(cst);
  if (!Array.isArray(result) || !result.every(isPathSegment)) {
    throw new ConfigurationError(`Invalid metadata path "${input}"`, { path: input });
  }
  return result;
}

/**
 * Get serialized grammar for documentation/diagram generation.
 */
export function getPathGrammar() {
  return parserInstance.getSerializedGastProductions();
}
