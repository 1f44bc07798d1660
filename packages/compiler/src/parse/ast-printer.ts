import { type Node, NodeKind, type Param } from '../core/nodes.ts'

function formatNumber(value: number, isFloat: boolean): string {
	const text = String(value)
	return isFloat && Number.isInteger(value) ? `${text}.0` : text
}

function formatParams(params: readonly Param[]): string {
	return params.map((p) => `${p.type} ${p.name}`).join(', ')
}

function assertNever(node: never): never {
	throw new Error(`unhandled node: ${JSON.stringify(node)}`)
}

/** Label for a node's own line, without its children. */
function describe(node: Node): string {
	switch (node.kind) {
		case NodeKind.Program:
			return 'Program'
		case NodeKind.Function:
			return `Function ${node.returnType} ${node.name}(${formatParams(node.params)})`
		case NodeKind.Extern:
			return `Extern ${node.returnType} ${node.name}(${formatParams(node.params)})`
		case NodeKind.Block:
			return 'Block'
		case NodeKind.VarDecl:
			return `VarDecl ${node.type} ${node.name}`
		case NodeKind.ExprStmt:
			return 'ExprStmt'
		case NodeKind.Return:
			return 'Return'
		case NodeKind.If:
			return 'If'
		case NodeKind.While:
			return 'While'
		case NodeKind.NumberLiteral:
			return `Number ${formatNumber(node.value, node.isFloat)}`
		case NodeKind.BoolLiteral:
			return `Bool ${node.value}`
		case NodeKind.Identifier:
			return `Identifier ${node.name}`
		case NodeKind.Binary:
			return `Binary ${node.operator}`
		case NodeKind.Unary:
			return `Unary ${node.operator}`
		case NodeKind.Call:
			return `Call ${node.callee}`
		case NodeKind.Assign:
			return `Assign ${node.target}`
		default:
			return assertNever(node)
	}
}

function childrenOf(node: Node): readonly Node[] {
	switch (node.kind) {
		case NodeKind.Program:
			return node.declarations
		case NodeKind.Function:
			return [node.body]
		case NodeKind.Block:
			return node.statements
		case NodeKind.VarDecl:
			return node.initializer ? [node.initializer] : []
		case NodeKind.ExprStmt:
			return [node.expression]
		case NodeKind.Return:
			return node.value ? [node.value] : []
		case NodeKind.If:
			return node.elseBranch
				? [node.condition, node.thenBranch, node.elseBranch]
				: [node.condition, node.thenBranch]
		case NodeKind.While:
			return [node.condition, node.body]
		case NodeKind.Binary:
			return [node.left, node.right]
		case NodeKind.Unary:
			return [node.operand]
		case NodeKind.Call:
			return node.args
		case NodeKind.Assign:
			return [node.value]
		default:
			return []
	}
}

function formatInto(node: Node, depth: number, lines: string[]): void {
	lines.push(`${'  '.repeat(depth)}${describe(node)}`)
	for (const child of childrenOf(node)) {
		formatInto(child, depth + 1, lines)
	}
}

/**
 * Indented dump of a tree, one node per line, two spaces per level.
 *
 * @example
 * formatAst(program)
 * // Program
 * //   Function int main()
 * //     Block
 * //       Return
 * //         Number 0
 */
export function formatAst(node: Node): string {
	const lines: string[] = []
	formatInto(node, 0, lines)
	return lines.join('\n')
}
