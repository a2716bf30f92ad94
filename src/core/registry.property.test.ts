/**
 * Property-based tests for the metric tree.
 *
 * **Identity**: a tag always resolves to the same node.
 * **Ancestry**: following `parent` from any node walks exactly the tag's
 * prefixes, longest first, ending at a root.
 * **Rejection**: malformed tags never create nodes.
 *
 * @module core/registry.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { MetrRegistry } from './registry.js';
import { InvalidTagError } from './errors.js';
import type { Metr } from './metr.js';
import { tagPrefixes } from './tag.js';
import { invalidTagArb, metricValueArb, tagArb } from '../test/arbitraries.js';
import { createCaptureHandler } from '../test/captureHandler.js';

function ancestry(node: Metr): string[] {
  const tags: string[] = [];
  for (let current: Metr | null = node; current !== null; current = current.parent) {
    tags.push(current.tag);
  }
  return tags;
}

describe('Property: tag identity', () => {
  it('returns the same node however many times and in whatever order tags are requested', () => {
    fc.assert(
      fc.property(fc.array(tagArb, { minLength: 1, maxLength: 20 }), (tags) => {
        const registry = new MetrRegistry();
        const first = tags.map((tag) => registry.get(tag));
        const second = [...tags].reverse().map((tag) => registry.get(tag)).reverse();

        first.forEach((node, i) => expect(second[i]).toBe(node));
      }),
    );
  });
});

describe('Property: ancestry', () => {
  it('links every node to the node of its prefix', () => {
    fc.assert(
      fc.property(fc.array(tagArb, { minLength: 1, maxLength: 10 }), (tags) => {
        const registry = new MetrRegistry();
        for (const tag of tags) registry.get(tag);

        for (const tag of tags) {
          expect(ancestry(registry.get(tag))).toEqual(tagPrefixes(tag).reverse());
        }
      }),
    );
  });

  it('registers exactly the prefixes of the requested tags', () => {
    fc.assert(
      fc.property(fc.array(tagArb, { minLength: 1, maxLength: 10 }), (tags) => {
        const registry = new MetrRegistry();
        for (const tag of tags) registry.get(tag);

        const expected = new Set(tags.flatMap((tag) => tagPrefixes(tag)));
        expect(registry.tags()).toEqual([...expected].sort());
      }),
    );
  });
});

describe('Property: propagation', () => {
  it('delivers one record to each ancestor with the originating tag', () => {
    fc.assert(
      fc.property(tagArb, metricValueArb, (tag, value) => {
        const registry = new MetrRegistry();
        const handlers = tagPrefixes(tag).map((prefix) => {
          const handler = createCaptureHandler(prefix);
          registry.get(prefix).addHandler(handler);
          return handler;
        });

        registry.get(tag).rec(value);

        const delivered = handlers.map((h) => h.records);
        for (const records of delivered) {
          expect(records).toHaveLength(1);
          expect(records[0]!.tag).toBe(tag);
          expect(records[0]!.value).toBe(value);
          expect(records[0]).toBe(delivered[0]![0]);
        }
      }),
    );
  });
});

describe('Property: rejection', () => {
  it('throws InvalidTagError and leaves the registry unchanged', () => {
    fc.assert(
      fc.property(invalidTagArb, (tag) => {
        const registry = new MetrRegistry();
        expect(() => registry.get(tag)).toThrow(InvalidTagError);
        expect(registry.size).toBe(0);
      }),
    );
  });
});
