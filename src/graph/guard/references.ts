import type { GuardExpression } from './ast';

/** Ids a guard mentions through `retries()` and `visits()` */
export interface GuardReferences {
    edges: string[];
    nodes: string[];
    paths: string[];
}

export function collectReferences(expression: GuardExpression): GuardReferences {
    const refs: GuardReferences = { edges: [], nodes: [], paths: [] };
    walk(expression, refs);
    return refs;
}

function walk(expression: GuardExpression, refs: GuardReferences): void {
    switch (expression.kind) {
        case 'literal':
            return;
        case 'list':
            expression.items.forEach(item => walk(item, refs));
            return;
        case 'path':
            refs.paths.push(expression.text);
            return;
        case 'not':
            walk(expression.operand, refs);
            return;
        case 'logical':
        case 'compare':
            walk(expression.left, refs);
            walk(expression.right, refs);
            return;
        case 'membership':
            walk(expression.item, refs);
            walk(expression.collection, refs);
            return;
        case 'call': {
            const [arg] = expression.args;
            if (arg && arg.kind === 'literal' && typeof arg.value === 'string') {
                if (expression.fn === 'retries') refs.edges.push(arg.value);
                if (expression.fn === 'visits') refs.nodes.push(arg.value);
            }
            expression.args.forEach(a => walk(a, refs));
            return;
        }
    }
}
