import { describe, it, expect } from 'vitest';

import { createChildLogger, createRequestLogger, getLogger } from './logger.js';

describe('logger', () => {
  it('should reuse one root logger', () => {
    expect(getLogger()).toBe(getLogger());
  });

  it('should bind module context to child loggers', () => {
    expect(createChildLogger({ service: 'metadata' }).bindings()).toMatchObject({ service: 'metadata' });
  });

  it('should bind the operation and trace id to request loggers', () => {
    expect(createRequestLogger('raw.preview', 'trace-7').bindings()).toMatchObject({
      service: 'operation',
      op: 'raw.preview',
      traceId: 'trace-7',
    });
    expect(createRequestLogger('health', null).bindings()).toMatchObject({ op: 'health', traceId: null });
  });
});
