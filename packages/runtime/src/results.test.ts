import { describe, expect, it } from 'vitest';
import { imageContent, Message, ToolResult } from './results.js';

describe('result wrappers', () => {
  it('should base64 encode raw image bytes', () => {
    const bytes = new Uint8Array([0x68, 0x69]);
    expect(imageContent(bytes)).toEqual({ type: 'image', data: 'aGk=', mimeType: 'image/png' });
  });

  it('should keep pre-encoded image data', () => {
    expect(imageContent('aGk=', 'image/jpeg')).toEqual({
      type: 'image',
      data: 'aGk=',
      mimeType: 'image/jpeg'
    });
  });

  it('should build text content from a string', () => {
    expect(new ToolResult('done').toJSON()).toEqual({
      content: [{ type: 'text', text: 'done' }],
      isError: false
    });
  });

  it('should serialise messages with their role', () => {
    expect(JSON.stringify(new Message('hi', 'assistant'))).toBe(
      '{"role":"assistant","content":{"type":"text","text":"hi"}}'
    );
  });
});
