import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidValueError } from './errors.js';
import type { MetricRecord } from './record.js';
import { MetrRegistry } from './registry.js';
import type { Handler } from './types.js';
import { createCaptureHandler } from '../test/captureHandler.js';

describe('Metr', () => {
  let registry: MetrRegistry;

  beforeEach(() => {
    registry = new MetrRegistry({ sessionId: 'test-session' });
  });

  describe('handleValue', () => {
    it('calls leaf handlers in order, then the parent, all with the leaf tag', () => {
      const calls: string[] = [];
      const leaf = registry.get('p.leaf');
      leaf.addHandler(createCaptureHandler('H1', calls));
      leaf.addHandler(createCaptureHandler('H2', calls));
      registry.get('p').addHandler(createCaptureHandler('H3', calls));

      leaf.handleValue(5);

      expect(calls).toEqual(['H1:p.leaf', 'H2:p.leaf', 'H3:p.leaf']);
    });

    it('passes the same record instance up to the root', () => {
      const seen: MetricRecord[] = [];
      const collect: Handler = { handle: (record) => seen.push(record) };
      registry.get('a').addHandler(collect);
      registry.get('a.b').addHandler(collect);
      registry.get('a.b.c').addHandler(collect);

      registry.get('a.b.c').handleValue(8);

      expect(seen).toHaveLength(3);
      expect(seen[1]).toBe(seen[0]);
      expect(seen[2]).toBe(seen[0]);
      expect(seen[0]!.tag).toBe('a.b.c');
      expect(seen[0]!.value).toBe(8);
      expect(seen[0]!.sessionId).toBe('test-session');
    });

    it('reaches ancestors with no handlers of their own', () => {
      const root = createCaptureHandler('root');
      registry.get('a').addHandler(root);

      registry.get('a.b.c').handleValue(1);

      expect(root.records.map((r) => r.tag)).toEqual(['a.b.c']);
    });

    it('does not deliver to siblings or descendants', () => {
      const sibling = createCaptureHandler('sibling');
      const child = createCaptureHandler('child');
      registry.get('a.x').addHandler(sibling);
      registry.get('a.b.c').addHandler(child);

      registry.get('a.b').handleValue(1);

      expect(sibling.records).toHaveLength(0);
      expect(child.records).toHaveLength(0);
    });

    it('rejects non-integer values before any handler runs', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);

      expect(() => metr.handleValue(1.5)).toThrow(InvalidValueError);
      expect(handler.records).toHaveLength(0);
    });

    it('lets a handler failure reach the caller and stops the sweep there', () => {
      const calls: string[] = [];
      const leaf = registry.get('a.b');
      leaf.addHandler(createCaptureHandler('before', calls));
      leaf.addHandler({
        handle: () => {
          throw new Error('sink down');
        },
      });
      leaf.addHandler(createCaptureHandler('after', calls));
      registry.get('a').addHandler(createCaptureHandler('parent', calls));

      expect(() => leaf.handleValue(1)).toThrow('sink down');
      expect(calls).toEqual(['before:a.b']);
    });

    it('stays usable after a handler failure', () => {
      let fail = true;
      const parent = createCaptureHandler('parent');
      const leaf = registry.get('a.b');
      leaf.addHandler({
        handle: () => {
          if (fail) throw new Error('once');
        },
      });
      registry.get('a').addHandler(parent);

      expect(() => leaf.handleValue(1)).toThrow('once');
      fail = false;
      leaf.handleValue(2);

      expect(parent.records.map((r) => r.value)).toEqual([2]);
      expect(registry.get('a.b')).toBe(leaf);
    });
  });

  describe('addHandler', () => {
    it('ignores a handler that is already registered', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);
      metr.addHandler(handler);

      metr.handleValue(1);

      expect(metr.getHandlers()).toHaveLength(1);
      expect(handler.records).toHaveLength(1);
    });

    it('lets the same handler sit at two levels and receive both deliveries', () => {
      const handler = createCaptureHandler();
      registry.get('a').addHandler(handler);
      registry.get('a.b').addHandler(handler);

      registry.get('a.b').handleValue(1);

      expect(handler.records).toHaveLength(2);
    });

    it('does not apply retroactively', () => {
      const metr = registry.get('a');
      metr.handleValue(1);
      const late = createCaptureHandler();
      metr.addHandler(late);
      metr.handleValue(2);

      expect(late.records.map((r) => r.value)).toEqual([2]);
    });

    it('does not show a handler added during a dispatch to that dispatch', () => {
      const metr = registry.get('a');
      const late = createCaptureHandler('late');
      metr.addHandler({ handle: () => metr.addHandler(late) });

      metr.handleValue(1);
      expect(late.records).toHaveLength(0);

      metr.handleValue(2);
      expect(late.records.map((r) => r.value)).toEqual([2]);
    });
  });

  describe('getChild', () => {
    it('resolves through the registry', () => {
      const parent = registry.get('a');
      const child = parent.getChild('b');

      expect(child).toBe(registry.get('a.b'));
      expect(child.parent).toBe(parent);
      expect(parent.getChild('b.c').tag).toBe('a.b.c');
    });
  });

  describe('recorder shortcuts', () => {
    it('rec records one value', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);

      metr.rec(7);

      expect(handler.records.map((r) => r.value)).toEqual([7]);
    });

    it('counter commits on close', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);

      const counter = metr.counter();
      counter.add(8);
      counter.add(7);
      expect(handler.records).toHaveLength(0);
      counter.close();

      expect(handler.records.map((r) => r.value)).toEqual([15]);
    });

    it('withCounter commits when the callback returns', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);

      const result = metr.withCounter((counter) => {
        counter.add(2);
        counter.add(3);
        return 'done';
      });

      expect(result).toBe('done');
      expect(handler.records.map((r) => r.value)).toEqual([5]);
    });

    it('recException counts matching errors', () => {
      const handler = createCaptureHandler();
      const metr = registry.get('a');
      metr.addHandler(handler);
      const f = metr.recException(RangeError).wrap(() => {
        throw new RangeError('nope');
      });

      expect(() => f()).toThrow(RangeError);
      expect(handler.records.map((r) => r.value)).toEqual([1]);
    });
  });

  it('describes itself by tag', () => {
    expect(String(registry.get('a.b'))).toBe('Metr(a.b)');
  });
});
