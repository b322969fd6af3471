import { isType, NodeOfType, NodeType, SyntaxNode } from '../ast/nodes';

/**
 * A structural test that narrows a node to the shape it checks for.
 */
export type Matcher<T extends SyntaxNode> = (node: SyntaxNode | undefined) => node is T;

export type FieldMatchers<N> = { [K in keyof N]?: (value: N[K]) => boolean };

/**
 * Builds a matcher for nodes of a given type whose fields pass the given tests.
 * @param type The node type.
 * @param fields Tests for individual fields.
 * @returns The matcher.
 */
export function shape<K extends NodeType>(type: K, fields: FieldMatchers<NodeOfType<K>> = {}): Matcher<NodeOfType<K>> {
    return (node): node is NodeOfType<K> => {
        if (!isType(node, type)) {
            return false;
        }
        let key: keyof NodeOfType<K>;
        for (key in fields) {
            const test = fields[key];
            if (test && !test(node[key])) {
                return false;
            }
        }
        return true;
    };
}

/**
 * Builds a test for an array whose items all pass a test.
 * @param test The item test.
 * @param length The exact length required (optional).
 * @returns The test.
 */
export function every<T>(test: (item: T) => boolean, length?: number): (items: T[]) => boolean {
    return items => (length == undefined || items.length == length) && items.every(test);
}

/**
 * Builds a test for an exact value.
 * @param expected The expected value.
 * @returns The test.
 */
export function is<T>(expected: T): (value: T) => boolean {
    return value => value === expected;
}

/**
 * A test for an empty list field.
 */
export function empty(items: unknown[]): boolean {
    return items.length == 0;
}
