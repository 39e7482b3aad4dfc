import { describe, it, expect } from 'vitest';
import { keyToInput } from '../keymap.js';

describe('keyToInput', () => {
  it('maps editing and navigation keys', () => {
    expect(keyToInput(undefined, { name: 'backspace' })).toEqual({ type: 'delete' });
    expect(keyToInput('\r', { name: 'return' })).toEqual({ type: 'confirm' });
    expect(keyToInput(undefined, { name: 'escape' })).toEqual({ type: 'cancel' });
    expect(keyToInput(undefined, { name: 'up' })).toEqual({ type: 'move', delta: -1 });
    expect(keyToInput(undefined, { name: 'down' })).toEqual({ type: 'move', delta: 1 });
    expect(keyToInput(undefined, { name: 'pagedown' })).toEqual({ type: 'move', delta: 10 });
  });

  it('maps control chords', () => {
    expect(keyToInput(undefined, { name: 'c', ctrl: true })).toEqual({ type: 'cancel' });
    expect(keyToInput(undefined, { name: 'k', ctrl: true })).toEqual({ type: 'move', delta: -1 });
    expect(keyToInput(undefined, { name: 'u', ctrl: true })).toEqual({ type: 'clear_query' });
    expect(keyToInput(undefined, { name: 'p', ctrl: true })).toEqual({ type: 'open', view: 'pulls' });
    expect(keyToInput(undefined, { name: 't', ctrl: true })).toEqual({ type: 'open', view: 'issues' });
    expect(keyToInput(undefined, { name: 'x', ctrl: true })).toBeNull();
  });

  it('inserts printable text and drops control characters', () => {
    expect(keyToInput('a', { name: 'a', sequence: 'a' })).toEqual({ type: 'insert', text: 'a' });
    expect(keyToInput('we\tb', undefined)).toEqual({ type: 'insert', text: 'web' });
    expect(keyToInput('\u007f', undefined)).toBeNull();
    expect(keyToInput('a', { name: 'a', meta: true })).toBeNull();
  });
});
