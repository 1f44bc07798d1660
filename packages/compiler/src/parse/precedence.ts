import type { BinaryOperator } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'

/**
 * Binding power of binary operators, low to high.
 * Assignment is right-associative and handled above the climb, so it has no entry.
 */
export const Precedence = {
	Additive: 5,
	Equality: 3,
	LogicalAnd: 2,
	LogicalOr: 1,
	Multiplicative: 6,
	None: -1,
	Relational: 4,
} as const

export type Precedence = (typeof Precedence)[keyof typeof Precedence]

interface BinaryOperatorInfo {
	readonly operator: BinaryOperator
	readonly precedence: Precedence
}

const BINARY_OPERATORS: ReadonlyMap<TokenKind, BinaryOperatorInfo> = new Map<
	TokenKind,
	BinaryOperatorInfo
>([
	[TokenKind.AndAnd, { operator: '&&', precedence: Precedence.LogicalAnd }],
	[TokenKind.EqualEqual, { operator: '==', precedence: Precedence.Equality }],
	[TokenKind.Greater, { operator: '>', precedence: Precedence.Relational }],
	[TokenKind.GreaterEqual, { operator: '>=', precedence: Precedence.Relational }],
	[TokenKind.Less, { operator: '<', precedence: Precedence.Relational }],
	[TokenKind.LessEqual, { operator: '<=', precedence: Precedence.Relational }],
	[TokenKind.Minus, { operator: '-', precedence: Precedence.Additive }],
	[TokenKind.NotEqual, { operator: '!=', precedence: Precedence.Equality }],
	[TokenKind.OrOr, { operator: '||', precedence: Precedence.LogicalOr }],
	[TokenKind.Percent, { operator: '%', precedence: Precedence.Multiplicative }],
	[TokenKind.Plus, { operator: '+', precedence: Precedence.Additive }],
	[TokenKind.Slash, { operator: '/', precedence: Precedence.Multiplicative }],
	[TokenKind.Star, { operator: '*', precedence: Precedence.Multiplicative }],
])

/** Operator info for a token, or null when the token is not a binary operator. */
export function binaryOperatorOf(kind: TokenKind): BinaryOperatorInfo | null {
	return BINARY_OPERATORS.get(kind) ?? null
}

export function precedenceOf(kind: TokenKind): Precedence {
	return BINARY_OPERATORS.get(kind)?.precedence ?? Precedence.None
}
