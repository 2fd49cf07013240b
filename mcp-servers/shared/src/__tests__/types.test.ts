/**
 * MCP response helpers
 */

import * as shared from '../index';
import { createJsonResponse, createTextResponse } from '../types';

describe('response helpers', () => {
  it('should wrap text in a single text content item', () => {
    expect(createTextResponse('done')).toEqual({ content: [{ type: 'text', text: 'done' }] });
  });

  it('should pretty-print JSON responses', () => {
    expect(createJsonResponse({ a: 1 })).toEqual({ content: [{ type: 'text', text: '{\n  "a": 1\n}' }] });
  });

  it('should export only the helpers the servers use', () => {
    const helpers = Object.keys(shared).filter(name => name.endsWith('Response'));
    expect(helpers.sort()).toEqual(['createJsonResponse', 'createTextResponse']);
  });
});
