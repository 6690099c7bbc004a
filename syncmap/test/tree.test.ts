import { describe, expect, it } from 'vitest';
import { Tree } from '../src/tree.js';

function values(nodes: readonly Tree<string>[]): (string | undefined)[] {
  return nodes.map((node) => node.value);
}

describe('Tree', () => {
  it('starts as an empty root of height 1', () => {
    const root = new Tree<string>();

    expect(root.isRoot).toBe(true);
    expect(root.isLeaf).toBe(true);
    expect(root.isEmpty).toBe(true);
    expect(root.height).toBe(1);
    expect(root.vchildrenNotEmpty).toEqual([]);
  });

  it('appends and prepends children', () => {
    const root = new Tree<string>();
    root.addChild(new Tree('b'));
    root.addChild(new Tree('c'), true);
    root.addChild(new Tree('a'), false);

    expect(values(root.children)).toEqual(['a', 'b', 'c']);
    expect(root.height).toBe(2);
    expect(root.children[0]?.parent).toBe(root);
  });

  it('computes height from the deepest branch', () => {
    const root = new Tree<string>();
    const a = new Tree('a');
    const a1 = new Tree('a1');
    a1.addChild(new Tree('a1x'));
    a.addChild(a1);
    root.addChild(a);
    root.addChild(new Tree('b'));

    expect(root.height).toBe(4);
    expect(a.height).toBe(3);
  });

  it('skips valueless children but keeps their non-empty descendants in place', () => {
    const root = new Tree<string>();
    const structural = new Tree<string>();
    structural.addChild(new Tree('b'));
    structural.addChild(new Tree<string>());
    structural.addChild(new Tree('c'));
    root.addChild(new Tree('a'));
    root.addChild(structural);
    root.addChild(new Tree('d'));

    expect(root.vchildrenNotEmpty).toEqual(['a', 'b', 'c', 'd']);
    expect(root.children).toHaveLength(3);
  });

  it('moves a node out of its previous parent when re-attached', () => {
    const first = new Tree<string>();
    const second = new Tree<string>();
    const node = new Tree('x');
    first.addChild(node);
    second.addChild(node);

    expect(first.children).toHaveLength(0);
    expect(second.children).toHaveLength(1);
    expect(node.parent).toBe(second);
  });

  it('refuses to add a node to itself', () => {
    const node = new Tree('x');

    expect(() => node.addChild(node)).toThrow('Cannot add a tree node as a child of itself');
  });

  it('refuses to add an ancestor below its descendant', () => {
    const root = new Tree('root');
    const child = new Tree('child');
    const grandchild = new Tree('grandchild');
    root.addChild(child);
    child.addChild(grandchild);

    expect(() => grandchild.addChild(root)).toThrow('Cannot add an ancestor of a tree node as its child');
    expect(() => grandchild.addChild(child)).toThrow('Cannot add an ancestor of a tree node as its child');
    expect(root.parent).toBeUndefined();
    expect(child.parent).toBe(root);
    expect(grandchild.children).toHaveLength(0);
    expect(root.height).toBe(3);
  });

  it('visits nodes in pre-order', () => {
    const root = new Tree<string>('root');
    const a = new Tree('a');
    a.addChild(new Tree('a1'));
    a.addChild(new Tree('a2'));
    root.addChild(a);
    root.addChild(new Tree('b'));

    expect([...root.preOrder()].map((node) => node.value)).toEqual(['root', 'a', 'a1', 'a2', 'b']);
  });

  it('removes children', () => {
    const root = new Tree<string>();
    const a = new Tree('a');
    root.addChild(a);
    root.addChild(new Tree('b'));

    root.removeChild(a);
    expect(values(root.children)).toEqual(['b']);
    expect(a.parent).toBeUndefined();

    root.removeChildren();
    expect(root.children).toHaveLength(0);
    expect(root.height).toBe(1);
  });
});
