import { describe, it, expect } from 'vitest';
import { VERSION, USER_AGENT } from '../src/index.js';

describe('project setup', () => {
  it('should export VERSION', () => {
    expect(VERSION).toBe('1.0.0');
    expect(USER_AGENT).toBe('eol-scan/1.0.0');
  });
});
