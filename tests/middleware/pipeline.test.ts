import { describe, it, expect } from 'vitest';
import { createContext, pipeline } from '../../src/middleware/pipeline.js';
import type { Handler } from '../../src/middleware/pipeline.js';

describe('pipeline', () => {
  it('should call the handler directly when no middleware', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });

    const res = await pipeline()(handler)(new Request('http://test'), createContext('req_1'));

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('should apply middleware in order (left to right)', async () => {
    const order: string[] = [];

    const mw1 = (next: Handler): Handler => async (req, ctx) => {
      order.push('mw1-before');
      const res = await next(req, ctx);
      order.push('mw1-after');
      return res;
    };

    const mw2 = (next: Handler): Handler => async (req, ctx) => {
      order.push('mw2-before');
      const res = await next(req, ctx);
      order.push('mw2-after');
      return res;
    };

    const handler: Handler = async () => {
      order.push('handler');
      return new Response('ok');
    };

    await pipeline(mw1, mw2)(handler)(new Request('http://test'), createContext('req_1'));

    expect(order).toEqual(['mw1-before', 'mw2-before', 'handler', 'mw2-after', 'mw1-after']);
  });

  it('should allow middleware to short-circuit', async () => {
    const blocker = (_next: Handler): Handler => async () => new Response('blocked', { status: 429 });
    const handler: Handler = async () => {
      throw new Error('Should not reach handler');
    };

    const res = await pipeline(blocker)(handler)(new Request('http://test'), createContext('req_1'));

    expect(res.status).toBe(429);
    expect(await res.text()).toBe('blocked');
  });

  it('should allow middleware to fill in the context', async () => {
    const tagConversation = (next: Handler): Handler => async (req, ctx) => {
      ctx.conversationId = 'conv_42';
      return next(req, ctx);
    };
    const handler: Handler = async (_req, ctx) => new Response(ctx.conversationId ?? 'none');

    const res = await pipeline(tagConversation)(handler)(
      new Request('http://test'),
      createContext('req_1')
    );

    expect(await res.text()).toBe('conv_42');
  });
});

describe('createContext', () => {
  it('should start with no conversation and no body', () => {
    expect(createContext('req_9')).toEqual({ requestId: 'req_9', conversationId: null, body: null });
  });
});
