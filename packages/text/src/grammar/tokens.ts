/**
 * Pattern Language Tokens
 *
 * Order matters: chevrotain takes the first pattern that matches, so longer
 * operators precede their prefixes and keywords precede identifiers.
 */

import { createToken, Lexer, type TokenType } from "chevrotain"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })
export const LineComment = createToken({ name: "LineComment", pattern: /\/\/[^\n\r]*/, group: Lexer.SKIPPED })

export const Identifier = createToken({ name: "Identifier", pattern: /[a-zA-Z_][a-zA-Z0-9_]*/ })

function keyword(name: string, pattern: RegExp): TokenType {
  return createToken({ name, pattern, longer_alt: Identifier })
}

export const Match = keyword("Match", /match/i)
export const Where = keyword("Where", /where/i)
export const And = keyword("And", /and/i)
export const Or = keyword("Or", /or/i)
export const Xor = keyword("Xor", /xor/i)
export const Not = keyword("Not", /not/i)
export const True = keyword("True", /true/i)
export const False = keyword("False", /false/i)
export const Null = keyword("Null", /null/i)

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/,
})
export const FloatLiteral = createToken({ name: "FloatLiteral", pattern: /-?\d+\.\d+/ })
export const IntegerLiteral = createToken({ name: "IntegerLiteral", pattern: /-?\d+/ })

export const ComparisonOperator = createToken({ name: "ComparisonOperator", pattern: Lexer.NA })

export const RightArrow = createToken({ name: "RightArrow", pattern: /->/ })
export const LeftArrow = createToken({ name: "LeftArrow", pattern: /<-/ })
export const NotEqual = createToken({ name: "NotEqual", pattern: /<>|!=/, categories: ComparisonOperator })
export const LessEqual = createToken({ name: "LessEqual", pattern: /<=/, categories: ComparisonOperator })
export const GreaterEqual = createToken({ name: "GreaterEqual", pattern: />=/, categories: ComparisonOperator })
export const Less = createToken({ name: "Less", pattern: /</, categories: ComparisonOperator })
export const Greater = createToken({ name: "Greater", pattern: />/, categories: ComparisonOperator })
export const Equal = createToken({ name: "Equal", pattern: /=/, categories: ComparisonOperator })

export const Dash = createToken({ name: "Dash", pattern: /-/ })
export const Range = createToken({ name: "Range", pattern: /\.\./ })
export const Dot = createToken({ name: "Dot", pattern: /\./ })
export const Colon = createToken({ name: "Colon", pattern: /:/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ })
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ })
export const LCurly = createToken({ name: "LCurly", pattern: /\{/ })
export const RCurly = createToken({ name: "RCurly", pattern: /\}/ })

export const allTokens: TokenType[] = [
  WhiteSpace,
  LineComment,
  Match,
  Where,
  And,
  Xor,
  Or,
  Not,
  True,
  False,
  Null,
  Identifier,
  StringLiteral,
  FloatLiteral,
  IntegerLiteral,
  RightArrow,
  LeftArrow,
  ComparisonOperator,
  NotEqual,
  LessEqual,
  GreaterEqual,
  Less,
  Greater,
  Equal,
  Dash,
  Range,
  Dot,
  Colon,
  Comma,
  Star,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LCurly,
  RCurly,
]

export const scriptLexer = new Lexer(allTokens)
