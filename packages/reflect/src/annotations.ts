/**
 * Field annotations read from declarations:
 *
 * ```ts
 * interface Address {
 *   /** @rename zip *\/
 *   zipCode: number;
 *   /** @default "Unknown" *\/
 *   city?: string;
 *   /** @scalar int *\/
 *   floor: number;
 * }
 * ```
 *
 * Class properties with a literal initializer (`active = true`) get that
 * value as their default.
 */

import * as ts from "typescript";

/** Text of the first JSDoc tag named `tagName`; `""` for a bare tag. */
export function jsDocTagText(node: ts.Node, tagName: string): string | undefined {
  const tag = ts.getJSDocTags(node).find((t) => t.tagName.text === tagName);
  if (!tag) return undefined;
  return ts.getTextOfJSDocComment(tag.comment)?.trim() ?? "";
}

/** A literal expression's value, boxed so that `undefined` means "not a literal". */
export function literalValue(node: ts.Expression): { readonly value: unknown } | undefined {
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return { value: node.text };
  }
  if (ts.isNumericLiteral(node)) {
    return { value: Number(node.text) };
  }
  if (ts.isBigIntLiteral(node)) {
    return { value: BigInt(node.text.slice(0, -1)) };
  }
  if (ts.isPrefixUnaryExpression(node) && node.operator === ts.SyntaxKind.MinusToken) {
    if (ts.isNumericLiteral(node.operand)) return { value: -Number(node.operand.text) };
    if (ts.isBigIntLiteral(node.operand)) return { value: -BigInt(node.operand.text.slice(0, -1)) };
    return undefined;
  }
  if (ts.isParenthesizedExpression(node) || ts.isAsExpression(node)) {
    return literalValue(node.expression);
  }
  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return { value: true };
    case ts.SyntaxKind.FalseKeyword:
      return { value: false };
    case ts.SyntaxKind.NullKeyword:
      return { value: null };
  }
  if (ts.isArrayLiteralExpression(node)) {
    const values: unknown[] = [];
    for (const element of node.elements) {
      const literal = literalValue(element);
      if (!literal) return undefined;
      values.push(literal.value);
    }
    return { value: values };
  }
  return undefined;
}
