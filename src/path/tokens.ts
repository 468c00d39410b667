/**
 * @module path/tokens
 *
 * Tokens of the metadata path language: `object:acme::User/field:id(long)`.
 */

import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});

export const Slash = createToken({ name: 'Slash', pattern: /\// });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });

/**
 * Type, name or subType. Package-qualified names keep their `::` separators,
 * which is why the single `:` between type and name is a separate token.
 */
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[a-zA-Z_$][a-zA-Z0-9_$.-]*(?:::[a-zA-Z_$][a-zA-Z0-9_$.-]*)*/,
});

export const allTokens = [WhiteSpace, Identifier, Slash, Colon, LParen, RParen];

export const PathLexer = new Lexer(allTokens);
