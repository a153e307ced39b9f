/**
 * Tree Traversal
 *
 * Double dispatch between nodes and backend visitors, plus query helpers
 * for walking and searching document trees.
 */

import {
  DocKind,
  isCompositeNode,
  type CompositeNode,
  type DocNode,
  type LeafNode
} from './ast-types.js';

/**
 * Backend visitor. Leaves get one `visit` call; composites get `visitPre`,
 * then their children in list order, then `visitPost`.
 */
export interface DocVisitor {
  visit(node: LeafNode): void;
  visitPre(node: CompositeNode): void;
  visitPost(node: CompositeNode): void;
}

/**
 * Dispatch `node` to `visitor`
 */
export function acceptNode(node: DocNode, visitor: DocVisitor): void {
  if (!isCompositeNode(node)) {
    visitor.visit(node);
    return;
  }

  visitor.visitPre(node);
  // headings that live outside the child list come first
  if (node.kind === DocKind.SimpleSect && node.title) acceptNode(node.title, visitor);
  if (node.kind === DocKind.HtmlTable && node.caption) acceptNode(node.caption, visitor);
  for (const child of node.children) {
    acceptNode(child, visitor);
  }
  visitor.visitPost(node);
}

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

export type WalkCallback = (node: DocNode, parent: CompositeNode | undefined) => VisitResult | void;

/**
 * Walk a tree top-down, including titles, captions and parameter names
 */
export function walkDoc(root: DocNode, callback: WalkCallback): void {
  walkRecursive(root, callback, undefined);
}

function walkRecursive(node: DocNode, callback: WalkCallback, parent: CompositeNode | undefined): VisitResult {
  const result = callback(node, parent) ?? VisitResult.Continue;
  if (result === VisitResult.Stop) return VisitResult.Stop;
  if (result === VisitResult.Skip || !isCompositeNode(node)) return VisitResult.Continue;

  for (const child of attachedNodes(node)) {
    if (walkRecursive(child, callback, node) === VisitResult.Stop) return VisitResult.Stop;
  }
  return VisitResult.Continue;
}

/**
 * Children plus the nodes a composite holds outside its child list
 */
function attachedNodes(node: CompositeNode): DocNode[] {
  switch (node.kind) {
    case DocKind.SimpleSect:
      return node.title ? [node.title, ...node.children] : node.children;
    case DocKind.HtmlTable:
      return node.caption ? [node.caption, ...node.children] : node.children;
    case DocKind.ParamList:
      return [...node.paramTypes, ...node.params, ...node.children];
    default:
      return node.children;
  }
}

/**
 * All nodes of one kind, in document order
 */
export function findNodes<K extends DocKind>(root: DocNode, kind: K): Array<Extract<DocNode, { kind: K }>> {
  const result: Array<Extract<DocNode, { kind: K }>> = [];
  walkDoc(root, node => {
    if (isOfKind(node, kind)) result.push(node);
  });
  return result;
}

function isOfKind<K extends DocKind>(node: DocNode, kind: K): node is Extract<DocNode, { kind: K }> {
  return node.kind === kind;
}

/**
 * Nearest ancestor whose kind is one of `kinds`
 */
export function findAncestor(node: DocNode, kinds: readonly DocKind[]): CompositeNode | undefined {
  let current = node.parent;
  while (current) {
    if (kinds.includes(current.kind)) return current;
    current = current.parent;
  }
  return undefined;
}

export function getAncestors(node: DocNode): CompositeNode[] {
  const result: CompositeNode[] = [];
  for (let current = node.parent; current; current = current.parent) result.push(current);
  return result;
}

export function isAncestor(ancestor: DocNode, descendant: DocNode): boolean {
  return getAncestors(descendant).some(a => a === ancestor);
}

/**
 * Position of a node in its parent's child list, -1 for detached nodes
 */
export function indexInParent(node: DocNode): number {
  return node.parent ? node.parent.children.indexOf(node) : -1;
}
