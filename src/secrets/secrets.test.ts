/**
 * Tests for secret kinds, MissingSecretValues and injectors
 */

import { describe, it, expect } from 'vitest';
import {
  InjectSecret,
  MissingSecretValues,
  OptionalSecret,
  RequiredSecret,
  SecretError,
  SecretErrorCode,
  formatSecretDescription,
  lookupSecretValue,
  makeSecret,
  registerSecretKind,
  resetSecretKinds,
  validateSecretDescription,
  type RawSecrets,
  type SecretDescription,
} from './index';

class FakeRequiredKey extends RequiredSecret {
  static description(): SecretDescription {
    return { scope: 'scope1', key: 'keyA', instructions: 'Ask the admin' };
  }
}

class FakeMissingKey extends RequiredSecret {
  static description(): SecretDescription {
    return { scope: 'scope1', key: 'missingKey', instructions: 'Ask someone else' };
  }
}

class FakeOptionalKey extends OptionalSecret {
  static description(): SecretDescription {
    return { scope: 'scope1', key: 'keyA', instructions: 'Ask the admin' };
  }
}

class FakeOptionalMissing extends OptionalSecret {
  static description(): SecretDescription {
    return { scope: 'scope1', key: 'missingKey', instructions: 'Ask someone else' };
  }
}

class ForgotDescription extends RequiredSecret {}

const raw: RawSecrets = { scope1: { keyA: 'hunter2' } };

// --- Required Secrets ---

describe('RequiredSecret', () => {
  it('reads the value from raw secrets', () => {
    const secret = FakeRequiredKey.make(raw);
    expect(secret).toBeInstanceOf(FakeRequiredKey);
    expect(secret.value).toBe('hunter2');
  });

  it('throws MissingSecretValues with exactly its description when the key is missing', () => {
    try {
      FakeMissingKey.make(raw);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(MissingSecretValues);
      expect((err as MissingSecretValues).descriptions).toEqual([FakeMissingKey.description()]);
    }
  });

  it('throws MissingSecretValues when the scope is missing', () => {
    expect(() => FakeRequiredKey.make({ other: { keyA: 'x' } })).toThrow(MissingSecretValues);
    expect(() => FakeRequiredKey.make({})).toThrow(MissingSecretValues);
  });

  it('accepts empty strings as present values', () => {
    expect(FakeRequiredKey.make({ scope1: { keyA: '' } }).value).toBe('');
  });

  it('does not resolve keys from the object prototype', () => {
    class ProtoKey extends RequiredSecret {
      static description(): SecretDescription {
        return { scope: 'constructor', key: 'toString', instructions: 'n/a' };
      }
    }
    expect(() => ProtoKey.make({})).toThrow(MissingSecretValues);
    expect(() => ProtoKey.make({ constructor: {} })).toThrow(MissingSecretValues);
  });

  it('fails loudly when description() is not overridden', () => {
    try {
      ForgotDescription.make(raw);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SecretError);
      expect((err as SecretError).code).toBe(SecretErrorCode.NOT_IMPLEMENTED);
      expect((err as SecretError).message).toBe(
        'Secret kind "ForgotDescription" must override static description()'
      );
    }
  });

  it('serializes as a pointer to its registered kind id, never the value', () => {
    resetSecretKinds();
    registerSecretKind('fakes.FakeRequiredKey', FakeRequiredKey);
    const secret = FakeRequiredKey.make(raw);
    expect(JSON.stringify({ secret })).toBe('{"secret":{"kind":"fakes.FakeRequiredKey"}}');
    expect(String(secret)).toBe('FakeRequiredKey(***)');
    resetSecretKinds();
  });

  it('refuses to serialize a secret whose kind is not registered', () => {
    resetSecretKinds();
    const secret = FakeRequiredKey.make(raw);
    try {
      JSON.stringify(secret);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect((err as SecretError).code).toBe(SecretErrorCode.UNKNOWN_KIND);
      expect((err as SecretError).message).toBe('Secret kind "FakeRequiredKey" is not registered');
    }
  });
});

// --- Optional Secrets ---

describe('OptionalSecret', () => {
  it('reads the value from raw secrets', () => {
    expect(FakeOptionalKey.make(raw).value).toBe('hunter2');
  });

  it('is null when the key is missing', () => {
    const secret = FakeOptionalMissing.make(raw);
    expect(secret).toBeInstanceOf(FakeOptionalMissing);
    expect(secret.value).toBeNull();
    expect(String(secret)).toBe('FakeOptionalMissing(unset)');
  });

  it('is null when the scope is missing', () => {
    expect(FakeOptionalKey.make({}).value).toBeNull();
  });
});

describe('makeSecret', () => {
  it('matches kind.make for required and optional kinds', () => {
    expect(makeSecret(FakeRequiredKey, raw)).toEqual(FakeRequiredKey.make(raw));
    expect(makeSecret(FakeOptionalMissing, raw)).toEqual(FakeOptionalMissing.make(raw));
    expect(() => makeSecret(FakeMissingKey, raw)).toThrow(MissingSecretValues);
  });
});

// --- MissingSecretValues ---

describe('MissingSecretValues', () => {
  const a: SecretDescription = { scope: 's1', key: 'a', instructions: 'get a' };
  const b: SecretDescription = { scope: 's2', key: 'b', instructions: 'get b' };

  it('is a SecretError with MISSING_SECRETS code', () => {
    const err = new MissingSecretValues([a]);
    expect(err).toBeInstanceOf(SecretError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe(SecretErrorCode.MISSING_SECRETS);
    expect(err.name).toBe('MissingSecretValues');
  });

  it('renders a preamble and one line per description', () => {
    const err = new MissingSecretValues([a, b]);
    expect(err.message).toBe(
      'Missing the following secrets:\n' +
      '- scope "s1", key "a": get a\n' +
      '- scope "s2", key "b": get b'
    );
  });

  it('rejects an empty description list', () => {
    try {
      new MissingSecretValues([]);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).not.toBeInstanceOf(MissingSecretValues);
      expect((err as SecretError).code).toBe(SecretErrorCode.INVALID_ARGUMENT);
    }
  });

  it('combines errors in order, keeping duplicates', () => {
    const combined = MissingSecretValues.combine([
      new MissingSecretValues([a]),
      new MissingSecretValues([b, a]),
      new MissingSecretValues([a]),
    ]);
    expect(combined.descriptions).toEqual([a, b, a, a]);
  });

  it('combines a single error into an equal one', () => {
    const single = new MissingSecretValues([a, b]);
    const combined = MissingSecretValues.combine([single]);
    expect(combined).not.toBe(single);
    expect(combined.descriptions).toEqual([a, b]);
    expect(combined.message).toBe(single.message);
  });

  it('refuses to combine zero errors', () => {
    expect(() => MissingSecretValues.combine([])).toThrow(SecretError);
  });

  it('does not share its description list with the caller', () => {
    const descriptions = [a];
    const err = new MissingSecretValues(descriptions);
    descriptions.push(b);
    expect(err.descriptions).toEqual([a]);
  });
});

// --- Injectors ---

describe('InjectSecret', () => {
  it('can be created before any secrets exist', () => {
    expect(() => new InjectSecret(FakeMissingKey)).not.toThrow();
    expect(String(new InjectSecret(FakeMissingKey))).toBe('InjectSecret(FakeMissingKey)');
  });

  it('injects the same value as make', () => {
    const injector = new InjectSecret(FakeRequiredKey);
    expect(injector.inject(raw)).toEqual(FakeRequiredKey.make(raw));
    expect(injector.inject(raw).value).toBe('hunter2');
  });

  it('injects optional secrets', () => {
    expect(new InjectSecret(FakeOptionalMissing).inject(raw).value).toBeNull();
  });

  it('propagates MissingSecretValues unchanged', () => {
    const injector = new InjectSecret(FakeMissingKey);
    expect(() => injector.inject(raw)).toThrow(MissingSecretValues);
    expect(() => injector.inject(raw)).toThrow(
      'Missing the following secrets:\n- scope "scope1", key "missingKey": Ask someone else'
    );
  });

  it('looks up the store on every call', () => {
    const injector = new InjectSecret(FakeRequiredKey);
    expect(injector.inject({ scope1: { keyA: 'first' } }).value).toBe('first');
    expect(injector.inject({ scope1: { keyA: 'second' } }).value).toBe('second');
  });
});

// --- Helpers ---

describe('validateSecretDescription', () => {
  it('accepts well-formed descriptions', () => {
    expect(() => validateSecretDescription(FakeRequiredKey.description())).not.toThrow();
  });

  it('rejects empty scope or key', () => {
    expect(() => validateSecretDescription({ scope: '', key: 'k', instructions: 'x' }))
      .toThrow('Secret description: scope must be a non-empty string');
    expect(() => validateSecretDescription({ scope: 's', key: '', instructions: 'x' }, 'Bad'))
      .toThrow('Secret kind "Bad": key must be a non-empty string');
  });

  it('rejects surrounding whitespace', () => {
    expect(() => validateSecretDescription({ scope: ' s', key: 'k', instructions: 'x' }))
      .toThrow(/leading or trailing whitespace/);
  });

  it('rejects overly long names', () => {
    expect(() => validateSecretDescription({ scope: 'a'.repeat(129), key: 'k', instructions: 'x' }))
      .toThrow(/maximum length/);
  });

  it('rejects blank instructions', () => {
    try {
      validateSecretDescription({ scope: 's', key: 'k', instructions: '  ' });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect((err as SecretError).code).toBe(SecretErrorCode.INVALID_DESCRIPTION);
      expect((err as SecretError).scope).toBe('s');
      expect((err as SecretError).key).toBe('k');
    }
  });
});

describe('lookupSecretValue', () => {
  it('returns the value or undefined', () => {
    const d = FakeRequiredKey.description();
    expect(lookupSecretValue(raw, d)).toBe('hunter2');
    expect(lookupSecretValue({ scope1: {} }, d)).toBeUndefined();
    expect(lookupSecretValue({}, d)).toBeUndefined();
  });
});

describe('formatSecretDescription', () => {
  it('names scope, key and instructions', () => {
    expect(formatSecretDescription({ scope: 'openai', key: 'api_key', instructions: 'Make one.' }))
      .toBe('scope "openai", key "api_key": Make one.');
  });
});
