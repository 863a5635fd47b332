/**
 * @fileoverview Type Resolver Unit Tests
 *
 * Tests for resolving type variables against generic class hierarchies.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  arrayOf,
  createToken,
  generic,
  memberDeclaration,
  typeVariable,
  typesEqual,
  wildcard,
} from '../../../src/domain';
import {
  containsUnresolvedVariable,
  getAllSupertypes,
  getSupertype,
  isSubclass,
  isSupertype,
  resolve,
  runtimeTypeOf,
} from '../../../src/infrastructure/types';

// ============================================================================
// Test Fixtures
// ============================================================================

class Holder<T> {
  static typeParameters = ['T'];
  value?: T;
}

class StringHolder extends Holder<string> {
  static supertypes = [generic(Holder, String)];
}

class Pair<A, B> {
  static typeParameters = ['A', 'B'];
  first?: A;
  second?: B;
}

class NumberedPair<X> extends Pair<X, number> {
  static typeParameters = ['X'];
  static supertypes = () => [generic(Pair, typeVariable(NumberedPair, 'X'), Number)];
}

class NamedPair extends NumberedPair<string> {
  static supertypes = () => [generic(NumberedPair, String)];
}

const HOLDER_T = typeVariable(Holder, 'T');

// ============================================================================
// Tests
// ============================================================================

describe('type resolver', () => {
  // ============================================================================
  // resolve
  // ============================================================================

  describe('resolve', () => {
    it('should bind a variable from a declared supertype', () => {
      expect(resolve(StringHolder, HOLDER_T)).toBe(String);
    });

    it('should follow bindings through intermediate generic classes', () => {
      expect(resolve(NamedPair, typeVariable(Pair, 'A'))).toBe(String);
      expect(resolve(NamedPair, typeVariable(Pair, 'B'))).toBe(Number);
    });

    it('should bind from a parameterized context', () => {
      expect(resolve(generic(Holder, Boolean), HOLDER_T)).toBe(Boolean);
    });

    it('should substitute inside structured types', () => {
      const resolved = resolve(StringHolder, generic(Pair, arrayOf(HOLDER_T), HOLDER_T));

      expect(typesEqual(resolved, generic(Pair, arrayOf(String), String))).toBe(true);
    });

    it('should leave unbound variables in place', () => {
      expect(resolve(Holder, HOLDER_T)).toBe(HOLDER_T);
    });

    it('should keep a static method variable distinct from the class variable', () => {
      const methodT = typeVariable(memberDeclaration(Holder, 'of', true), 'T');

      expect(methodT).not.toBe(HOLDER_T);
      expect(resolve(StringHolder, methodT)).toBe(methodT);
      expect(containsUnresolvedVariable(resolve(StringHolder, methodT))).toBe(true);
    });

    it('should intern member type variables', () => {
      const first = typeVariable(memberDeclaration(Holder, 'of', true), 'T');
      const second = typeVariable(memberDeclaration(Holder, 'of', true), 'T');
      const instanceT = typeVariable(memberDeclaration(Holder, 'of', false), 'T');

      expect(first).toBe(second);
      expect(first).not.toBe(instanceT);
    });
  });

  // ============================================================================
  // containsUnresolvedVariable
  // ============================================================================

  describe('containsUnresolvedVariable', () => {
    it('should find variables nested in arguments, arrays and wildcards', () => {
      expect(containsUnresolvedVariable(generic(Holder, arrayOf(HOLDER_T)))).toBe(true);
      expect(containsUnresolvedVariable(wildcard({ extends: [HOLDER_T] }))).toBe(true);
    });

    it('should accept fully resolved types', () => {
      expect(containsUnresolvedVariable(String)).toBe(false);
      expect(containsUnresolvedVariable(generic(Pair, String, arrayOf(Number)))).toBe(false);
      expect(containsUnresolvedVariable(createToken('IClock'))).toBe(false);
    });
  });

  // ============================================================================
  // Supertypes
  // ============================================================================

  describe('getAllSupertypes', () => {
    it('should list the type itself first, then its resolved supertypes', () => {
      expect(getAllSupertypes(StringHolder)).toEqual([StringHolder, generic(Holder, String)]);
    });
  });

  describe('getSupertype', () => {
    it('should find the parameterization of an ancestor', () => {
      const supertype = getSupertype(NamedPair, Pair);

      expect(supertype).toBeDefined();
      expect(supertype && typesEqual(supertype, generic(Pair, String, Number))).toBe(true);
    });

    it('should return undefined for unrelated classes', () => {
      expect(getSupertype(StringHolder, Pair)).toBeUndefined();
    });
  });

  describe('isSubclass', () => {
    it('should follow the prototype chain', () => {
      expect(isSubclass(NamedPair, Pair)).toBe(true);
      expect(isSubclass(Pair, NamedPair)).toBe(false);
    });

    it('should treat every class as a subclass of Object', () => {
      expect(isSubclass(Holder, Object)).toBe(true);
    });
  });

  describe('isSupertype', () => {
    it('should check parameterized supertypes argument by argument', () => {
      expect(isSupertype(generic(Holder, String), StringHolder)).toBe(true);
      expect(isSupertype(generic(Holder, Number), StringHolder)).toBe(false);
    });

    it('should admit any argument through an unbounded wildcard', () => {
      expect(isSupertype(generic(Holder, wildcard()), StringHolder)).toBe(true);
    });

    it('should check wildcard bounds', () => {
      const holderPairs = generic(Pair, wildcard({ extends: [Holder] }), Number);

      expect(isSupertype(holderPairs, generic(Pair, StringHolder, Number))).toBe(true);
      expect(isSupertype(holderPairs, generic(Pair, String, Number))).toBe(false);
    });

    it('should never relate tokens to classes', () => {
      expect(isSupertype(Object, createToken('IClock'))).toBe(false);
    });

    it('should accept a raw supertype of a parameterized type', () => {
      expect(isSupertype(Holder, generic(Holder, String))).toBe(true);
    });
  });

  // ============================================================================
  // runtimeTypeOf
  // ============================================================================

  describe('runtimeTypeOf', () => {
    it('should map primitives to their wrapper classes', () => {
      expect(runtimeTypeOf('text')).toBe(String);
      expect(runtimeTypeOf(42)).toBe(Number);
      expect(runtimeTypeOf(true)).toBe(Boolean);
    });

    it('should return the constructor of an object', () => {
      expect(runtimeTypeOf(new StringHolder())).toBe(StringHolder);
      expect(runtimeTypeOf(null)).toBe(Object);
      expect(runtimeTypeOf(Object.create(null))).toBe(Object);
    });
  });
});
