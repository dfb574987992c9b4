import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleSink } from '../src/output.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createConsoleSink', () => {
  it('prints plain lines unchanged', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createConsoleSink().print('[T][ ] read book');
    expect(spy).toHaveBeenCalledWith('[T][ ] read book');
  });

  it('writes errors to the console', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createConsoleSink().error('index out of bounds');
    expect(spy).toHaveBeenCalledOnce();
    expect(String(spy.mock.calls[0]?.[0])).toContain('index out of bounds');
  });
});
