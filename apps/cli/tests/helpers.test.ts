import { describe, it, expect } from 'vitest';
import { Priority } from '@task-registry/core';
import {
  parsePriorityArg,
  requirePriority,
  parseTaskId,
  parseTimestamp,
  parseCount,
  splitArgs,
} from '../src/helpers.js';

describe('parsePriorityArg', () => {
  it('parses names, numbers and p-levels', () => {
    expect(parsePriorityArg('high')).toBe(Priority.High);
    expect(parsePriorityArg('HIGH')).toBe(Priority.High);
    expect(parsePriorityArg('2')).toBe(Priority.Medium);
    expect(parsePriorityArg('p3')).toBe(Priority.Low);
  });

  it('returns null for anything else', () => {
    expect(parsePriorityArg('urgent')).toBeNull();
    expect(parsePriorityArg('')).toBeNull();
  });
});

describe('requirePriority', () => {
  it('throws on an unknown level', () => {
    expect(() => requirePriority('urgent')).toThrow("Invalid priority 'urgent'. Use high, medium or low");
  });
});

describe('number arguments', () => {
  it('accepts whole numbers', () => {
    expect(parseTaskId('12')).toBe(12);
    expect(parseTimestamp('1700000000')).toBe(1_700_000_000);
    expect(parseCount('0')).toBe(0);
  });

  it('rejects anything else', () => {
    expect(() => parseTaskId('abc')).toThrow("Invalid task id 'abc'. Expected a whole number");
    expect(() => parseTimestamp('-5')).toThrow("Invalid timestamp '-5'. Expected a whole number");
    expect(() => parseCount('1.5')).toThrow("Invalid number '1.5'. Expected a whole number");
    expect(() => parseTaskId('99999999999999999999')).toThrow("Invalid task id '99999999999999999999'. Number is too large");
  });
});

describe('splitArgs', () => {
  it('splits on whitespace', () => {
    expect(splitArgs('check   3')).toEqual(['check', '3']);
  });

  it('groups quoted words', () => {
    expect(splitArgs('add "buy milk" --due 100')).toEqual(['add', 'buy milk', '--due', '100']);
    expect(splitArgs("rename 1 'say \"hi\"'")).toEqual(['rename', '1', 'say "hi"']);
  });

  it('joins adjacent quoted and bare parts', () => {
    expect(splitArgs('add pre"fix suf"fix')).toEqual(['add', 'prefix suffix']);
  });

  it('keeps an empty quoted argument', () => {
    expect(splitArgs('rename 1 ""')).toEqual(['rename', '1', '']);
  });

  it('honours backslash escapes', () => {
    expect(splitArgs('add a\\ b')).toEqual(['add', 'a b']);
    expect(splitArgs('add "a \\"b\\""')).toEqual(['add', 'a "b"']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitArgs('add "oops')).toThrow('Unterminated " quote');
  });
});
