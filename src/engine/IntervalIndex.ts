import { Interval, RangeRule } from '../types';
import { intersect, overlaps, subrangeMap } from './Interval';

interface IndexNode {
    rule: RangeRule;
    /** Largest `source.end` in this node's subtree, itself included. */
    maxEnd: bigint;
    left?: IndexNode;
    right?: IndexNode;
}

/**
 * A stored rule together with the subtree bound of the node holding it.
 */
export interface IndexEntry {
    rule: RangeRule;
    maxEnd: bigint;
}

/**
 * An augmented binary search tree over translation rules, keyed by `source.start`.
 *
 * Each node keeps the largest source end found in its subtree so that searches
 * can skip subtrees that end before the query starts. Zero-length rules cover no
 * values and are not stored. The tree is never rebalanced:
 * its shape follows insertion order, with the first rule at the root and rules
 * whose start is not smaller than a node's start going to its right.
 */
export class IntervalIndex {
    private root?: IndexNode;
    private count = 0;

    /**
     * Builds an index by inserting the rules in order.
     */
    public static fromRules(rules: Iterable<RangeRule>): IntervalIndex {
        const index = new IntervalIndex();
        for (const rule of rules) {
            index.insert(rule);
        }
        return index;
    }

    public get size(): number {
        return this.count;
    }

    public isEmpty(): boolean {
        return this.root === undefined;
    }

    /**
     * Adds a rule, raising `maxEnd` along the descent path.
     */
    public insert(rule: RangeRule): void {
        if (rule.source.start >= rule.source.end) return;
        this.count++;
        const leaf: IndexNode = { rule, maxEnd: rule.source.end };
        if (!this.root) {
            this.root = leaf;
            return;
        }

        let node = this.root;
        for (;;) {
            if (node.maxEnd < rule.source.end) {
                node.maxEnd = rule.source.end;
            }

            if (rule.source.start < node.rule.source.start) {
                if (!node.left) {
                    node.left = leaf;
                    return;
                }
                node = node.left;
            } else {
                if (!node.right) {
                    node.right = leaf;
                    return;
                }
                node = node.right;
            }
        }
    }

    /**
     * Collects the part of every stored rule that overlaps the query, narrowed to the
     * overlap and translated into target space.
     *
     * Nodes are visited node first, then left subtree, then right subtree; the result
     * is not sorted.
     *
     * @param query - The source-space interval to look up.
     * @returns One narrowed rule per overlapping stored rule.
     */
    public findIntersections(query: Interval): RangeRule[] {
        const intersections: RangeRule[] = [];
        const stack: IndexNode[] = this.root ? [this.root] : [];

        while (stack.length > 0) {
            const node = stack.pop();
            // Nothing in this subtree reaches the query start.
            if (!node || node.maxEnd <= query.start) continue;

            const overlap = intersect(node.rule.source, query);
            if (overlap) {
                const narrowed = subrangeMap(node.rule, overlap);
                if (narrowed) {
                    intersections.push(narrowed);
                }
            }

            if (node.right) stack.push(node.right);
            if (node.left) stack.push(node.left);
        }

        return intersections;
    }

    /**
     * Returns the first stored rule found to overlap the query, descending a single path.
     *
     * The left subtree is taken whenever its bound reaches the query start; if nothing
     * there overlaps, no rule to the right can overlap either.
     */
    public findOverlapping(query: Interval): RangeRule | undefined {
        let node = this.root;
        while (node) {
            if (overlaps(node.rule.source, query)) {
                return node.rule;
            }
            if (node.left && node.left.maxEnd > query.start) {
                node = node.left;
            } else {
                node = node.right;
            }
        }
        return undefined;
    }

    /**
     * Lists the stored rules in ascending `source.start` order with their subtree bounds.
     */
    public entries(): IndexEntry[] {
        const entries: IndexEntry[] = [];
        const stack: IndexNode[] = [];
        let node = this.root;

        while (node || stack.length > 0) {
            while (node) {
                stack.push(node);
                node = node.left;
            }
            const current = stack.pop();
            if (!current) break;
            entries.push({ rule: current.rule, maxEnd: current.maxEnd });
            node = current.right;
        }

        return entries;
    }
}
