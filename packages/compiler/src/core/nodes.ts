/**
 * Abstract syntax tree produced by the parser.
 *
 * Nodes are readonly plain objects forming a strict tree: every child is
 * referenced by exactly one parent, and the whole tree is released together
 * when the Program is dropped. The code generator only reads it.
 */

/**
 * Node kinds - one per grammar production.
 * Grouped by category for clarity.
 */
export const NodeKind = {
	Assign: 106,
	Binary: 103,
	Block: 15,
	BoolLiteral: 101,
	Call: 105,
	ExprStmt: 11,

	// Declarations (200-249)
	Extern: 201,
	Function: 200,

	// Expressions (100-149)
	Identifier: 102,
	If: 13,
	NumberLiteral: 100,

	// Program root (255)
	Program: 255,
	Return: 12,
	Unary: 104,

	// Statements (10-99)
	VarDecl: 10,
	While: 14,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

/** Source type names. `void` is only valid as a return type. */
export type TypeName = 'int' | 'double' | 'bool' | 'void'

export type BinaryOperator =
	| '+'
	| '-'
	| '*'
	| '/'
	| '%'
	| '=='
	| '!='
	| '<'
	| '>'
	| '<='
	| '>='
	| '&&'
	| '||'

export type UnaryOperator = '-' | '!'

/** 1-indexed source position of the token that starts a node. */
export interface SourcePosition {
	readonly line: number
	readonly column: number
}

// =============================================================================
// Expressions
// =============================================================================

export interface NumberLiteral extends SourcePosition {
	readonly kind: typeof NodeKind.NumberLiteral
	readonly value: number
	/** Written with a decimal point, so it is a double rather than an int. */
	readonly isFloat: boolean
}

export interface BoolLiteral extends SourcePosition {
	readonly kind: typeof NodeKind.BoolLiteral
	readonly value: boolean
}

export interface Identifier extends SourcePosition {
	readonly kind: typeof NodeKind.Identifier
	readonly name: string
}

export interface BinaryExpr extends SourcePosition {
	readonly kind: typeof NodeKind.Binary
	readonly operator: BinaryOperator
	readonly left: Expression
	readonly right: Expression
}

export interface UnaryExpr extends SourcePosition {
	readonly kind: typeof NodeKind.Unary
	readonly operator: UnaryOperator
	readonly operand: Expression
}

export interface CallExpr extends SourcePosition {
	readonly kind: typeof NodeKind.Call
	readonly callee: string
	readonly args: readonly Expression[]
}

export interface AssignExpr extends SourcePosition {
	readonly kind: typeof NodeKind.Assign
	readonly target: string
	readonly value: Expression
}

export type Expression =
	| NumberLiteral
	| BoolLiteral
	| Identifier
	| BinaryExpr
	| UnaryExpr
	| CallExpr
	| AssignExpr

// =============================================================================
// Statements
// =============================================================================

export interface VarDecl extends SourcePosition {
	readonly kind: typeof NodeKind.VarDecl
	readonly type: TypeName
	readonly name: string
	readonly initializer: Expression | null
}

export interface ExprStmt extends SourcePosition {
	readonly kind: typeof NodeKind.ExprStmt
	readonly expression: Expression
}

export interface ReturnStmt extends SourcePosition {
	readonly kind: typeof NodeKind.Return
	readonly value: Expression | null
}

export interface IfStmt extends SourcePosition {
	readonly kind: typeof NodeKind.If
	readonly condition: Expression
	readonly thenBranch: Statement
	readonly elseBranch: Statement | null
}

export interface WhileStmt extends SourcePosition {
	readonly kind: typeof NodeKind.While
	readonly condition: Expression
	readonly body: Statement
}

export interface BlockStmt extends SourcePosition {
	readonly kind: typeof NodeKind.Block
	readonly statements: readonly Statement[]
}

export type Statement = VarDecl | ExprStmt | ReturnStmt | IfStmt | WhileStmt | BlockStmt

// =============================================================================
// Declarations
// =============================================================================

export interface Param extends SourcePosition {
	readonly type: TypeName
	readonly name: string
}

export interface FunctionDecl extends SourcePosition {
	readonly kind: typeof NodeKind.Function
	readonly returnType: TypeName
	readonly name: string
	readonly params: readonly Param[]
	readonly body: BlockStmt
}

export interface ExternDecl extends SourcePosition {
	readonly kind: typeof NodeKind.Extern
	readonly returnType: TypeName
	readonly name: string
	readonly params: readonly Param[]
}

export type Declaration = FunctionDecl | ExternDecl

export interface Program {
	readonly kind: typeof NodeKind.Program
	readonly declarations: readonly Declaration[]
}

export type Node = Expression | Statement | Declaration | Program

/** Functions of a program, in source order. */
export function functionsOf(program: Program): FunctionDecl[] {
	return program.declarations.filter(
		(decl): decl is FunctionDecl => decl.kind === NodeKind.Function
	)
}
