import { describe, it, expect } from 'vitest';
import { detectMode, expectedArgCount, toolName, usageLine } from '../../src/cli/mode';

describe('mode', () => {
  describe('detectMode', () => {
    it.each([
      ['foo-pub', 'publish'],
      ['foo-sub', 'subscribe'],
      ['foo-req', 'request'],
      ['foobarrply', 'reply'],
      ['nats-rply', 'reply'],
    ])('should select the mode for %s', (name, mode) => {
      expect(detectMode(name)).toBe(mode);
    });

    it('should look only at the base name', () => {
      expect(detectMode('/usr/local/bin/nats-sub')).toBe('subscribe');
      expect(detectMode('./tools/nats-req')).toBe('request');
    });

    it('should ignore case', () => {
      expect(detectMode('NATS-SUB')).toBe('subscribe');
    });

    it('should ignore a script extension', () => {
      expect(detectMode('/opt/nats-box/dist/bin/nats-sub.js')).toBe('subscribe');
      expect(detectMode('nats-rply.ts')).toBe('reply');
    });

    it('should publish for names shorter than 7 characters', () => {
      expect(detectMode('x-sub')).toBe('publish');
      expect(detectMode('ab-req')).toBe('publish');
      expect(detectMode('')).toBe('publish');
    });

    it('should publish when no suffix matches', () => {
      expect(detectMode('nats-box')).toBe('publish');
      expect(detectMode('nats-box.js')).toBe('publish');
      expect(detectMode('subscriber')).toBe('publish');
    });
  });

  it('should name the connection after the mode', () => {
    expect(toolName('publish')).toBe('NATS-PUB TOOL');
    expect(toolName('subscribe')).toBe('NATS-SUB TOOL');
    expect(toolName('request')).toBe('NATS-REQ TOOL');
    expect(toolName('reply')).toBe('NATS-RPLY TOOL');
  });

  it('should give each mode its usage line', () => {
    expect(usageLine('subscribe')).toBe('Usage: nats-sub [-s server] [-creds file] [-t] <subject>');
    expect(usageLine('reply')).toBe(
      'Usage: nats-rply [-s server] [-creds file] [-t] [-q queue] <subject> <response>'
    );
  });

  it('should expect one positional for subscribe and two otherwise', () => {
    expect(expectedArgCount('subscribe')).toBe(1);
    expect(expectedArgCount('publish')).toBe(2);
    expect(expectedArgCount('request')).toBe(2);
    expect(expectedArgCount('reply')).toBe(2);
  });
});
