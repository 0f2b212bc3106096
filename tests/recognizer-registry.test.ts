import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { RecognizerRegistry } from '../src/engines/recognizer-registry';
import type { Logger } from '../src/utils/logger';
import { FakeRecognizer } from './helpers';

const quietRegistry = (): RecognizerRegistry =>
  new RecognizerRegistry({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger);

describe('RecognizerRegistry property tests', () => {
  it('lists recognizers in registration order and finds each by id', () => {
    fc.assert(
      fc.property(fc.uniqueArray(fc.string({ minLength: 1 }), { minLength: 1, maxLength: 10 }), (ids) => {
        const registry = quietRegistry();
        const recognizers = ids.map((id) => new FakeRecognizer(id));
        recognizers.forEach((recognizer) => registry.register(recognizer));

        expect(registry.list()).toEqual(recognizers);
        for (const recognizer of recognizers) {
          expect(registry.get(recognizer.id)).toBe(recognizer);
        }
        expect(registry.current()).toBe(recognizers[0]);
      }),
      { numRuns: 100 }
    );
  });
});

describe('RecognizerRegistry unit tests', () => {
  it('has no selection when empty', () => {
    const registry = quietRegistry();
    expect(registry.current()).toBeUndefined();
    expect(registry.list()).toEqual([]);
  });

  it('selects the first registered recognizer', () => {
    const registry = quietRegistry();
    const first = new FakeRecognizer('tesseract');
    registry.register(first);
    registry.register(new FakeRecognizer('cloud'));

    expect(registry.current()).toBe(first);
  });

  it('selects by instance or by id', () => {
    const registry = quietRegistry();
    const a = new FakeRecognizer('a');
    const b = new FakeRecognizer('b');
    registry.register(a);
    registry.register(b);

    registry.select(b);
    expect(registry.current()).toBe(b);

    registry.select('a');
    expect(registry.current()).toBe(a);
  });

  it('throws when registering a duplicate id', () => {
    const registry = quietRegistry();
    registry.register(new FakeRecognizer('tesseract'));

    expect(() => registry.register(new FakeRecognizer('tesseract'))).toThrow('Recognizer already registered: tesseract');
  });

  it('throws when selecting an unknown recognizer', () => {
    const registry = quietRegistry();
    registry.register(new FakeRecognizer('a'));

    expect(() => registry.select('missing')).toThrow('Recognizer not registered: missing');
    expect(() => registry.select(new FakeRecognizer('a'))).toThrow('Recognizer not registered: a');
  });

  it('returns a copy of the recognizer list', () => {
    const registry = quietRegistry();
    registry.register(new FakeRecognizer('a'));

    const listed = registry.list();
    expect(listed).not.toBe(registry.list());
    expect(listed).toHaveLength(1);
  });
});
