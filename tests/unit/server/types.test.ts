/**
 * Unit tests for MCP Server Type Definitions
 *
 * @module tests/unit/server/types
 */

import { describe, it, expect } from 'vitest';
import { successResult } from '../../../src/server/types.js';

describe('successResult', () => {
  it('wraps data with success=true', () => {
    expect(successResult({ tier: 'Good' })).toEqual({ success: true, data: { tier: 'Good' } });
  });

  it('keeps falsy data', () => {
    expect(successResult(0)).toEqual({ success: true, data: 0 });
    expect(successResult(null)).toEqual({ success: true, data: null });
  });
});
