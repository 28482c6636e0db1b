import { parseTree, printParseErrorCode, type Node, type ParseError } from "jsonc-parser";

// Source key order of objects built by parseOrderedJson. Plain objects list
// integer-like keys first, whatever the payload said.
const keyOrder = new WeakMap<object, string[]>();

const toValue = (node: Node): unknown => {
  switch (node.type) {
    case "object": {
      const result: Record<string, unknown> = {};
      const order: string[] = [];
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || typeof keyNode.value !== "string") continue;
        const key = keyNode.value;
        // Duplicate keys: last value wins, first position stays.
        if (!Object.prototype.hasOwnProperty.call(result, key)) order.push(key);
        Object.defineProperty(result, key, {
          value: valueNode ? toValue(valueNode) : null,
          enumerable: true,
          writable: true,
          configurable: true
        });
      }
      keyOrder.set(result, order);
      return result;
    }
    case "array":
      return (node.children ?? []).map((child) => toValue(child));
    default:
      return node.value;
  }
};

/** JSON.parse, except that objects remember the key order of the text. */
export const parseOrderedJson = (text: string): unknown => {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false });
  const [first] = errors;
  if (first) {
    throw new SyntaxError(`Invalid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!root) {
    throw new SyntaxError("Invalid JSON: empty document");
  }
  return toValue(root);
};

/** Entries in source order for parsed objects, `Object.entries` order otherwise. */
export const orderedEntries = (value: Record<string, unknown>): Array<[string, unknown]> => {
  const order = keyOrder.get(value);
  if (!order) return Object.entries(value);
  return order.filter((key) => Object.prototype.hasOwnProperty.call(value, key)).map((key): [string, unknown] => [key, value[key]]);
};
