import { describe, expect, it } from 'vitest';
import { parseClientMessage } from './Protocol.js';

describe('parseClientMessage', () => {
  it('parses input', () => {
    expect(parseClientMessage('{"type":"input","data":"ls\\r"}')).toEqual({ type: 'input', data: 'ls\r' });
  });

  it('defaults missing input data to an empty string', () => {
    expect(parseClientMessage('{"type":"input"}')).toEqual({ type: 'input', data: '' });
  });

  it('defaults missing resize fields to 24 by 80', () => {
    expect(parseClientMessage('{"type":"resize"}')).toEqual({ type: 'resize', rows: 24, cols: 80 });
  });

  it('keeps out-of-range resize values for the bridge to clamp', () => {
    expect(parseClientMessage('{"type":"resize","rows":0,"cols":-1}')).toEqual({ type: 'resize', rows: 0, cols: -1 });
  });

  it('parses connect with the default port', () => {
    const message = parseClientMessage(Buffer.from('{"type":"connect","host":"example.test","username":"user","credential":"test-secret"}'));

    expect(message).toEqual({
      type: 'connect',
      host: 'example.test',
      port: 22,
      username: 'user',
      credential: 'test-secret',
    });
  });

  it('rejects connect without a host', () => {
    expect(parseClientMessage('{"type":"connect","host":"","username":"user","credential":"x"}')).toBeNull();
  });

  it('returns null for unknown kinds and malformed frames', () => {
    expect(parseClientMessage('{"type":"ping"}')).toBeNull();
    expect(parseClientMessage('{"type":"resize","rows":"big"}')).toBeNull();
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage('42')).toBeNull();
  });
});
