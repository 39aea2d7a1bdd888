import {mkdtemp, readdir, rm} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import path from 'node:path';
import {setTimeout as delay} from 'node:timers/promises';

import {createStructuredLogger, getLogContext} from '@gatewire/logging';
import {describe, expect, it} from 'vitest';

import {dispatchRequest, getRequestContext, internalError, redirect, type RequestContext} from '../index';
import {createBufferedWriter, createMockLogger, makeEnvironment, makeFormPost, makeMultipartPost} from './fixtures';

describe('dispatchRequest', () => {
  it('turns a returned outcome into the response', async () => {
    const response = await dispatchRequest({
      environment: makeEnvironment({SCRIPT_NAME: '/app', PATH_INFO: '/x'}),
      handler: ctx => redirect(ctx, 'y')
    });

    expect(response.status).toBe('301 Moved Permanently');
    expect(response.statusCode).toBe(301);
    expect(response.headers).toEqual([
      {name: 'Content-Type', value: 'text/html'},
      {name: 'Location', value: 'http://example.test/app/y'}
    ]);
    expect(response.body.length).toBe(0);
  });

  it('sends strings, bytes and empty results with the current status', async () => {
    const text = await dispatchRequest({environment: makeEnvironment(), handler: () => 'hello'});
    expect(text.status).toBe('200 OK');
    expect(text.body.toString('utf8')).toBe('hello');

    const bytes = await dispatchRequest({environment: makeEnvironment(), handler: () => new Uint8Array([1, 2])});
    expect([...bytes.body]).toEqual([1, 2]);

    const empty = await dispatchRequest({
      environment: makeEnvironment(),
      handler: ctx => {
        ctx.setStatus(202);
      }
    });
    expect(empty.status).toBe('202 Accepted');
    expect(empty.body.length).toBe(0);
  });

  it('answers a missing required field with 400', async () => {
    const response = await dispatchRequest({
      environment: makeFormPost('other=1'),
      handler: async ctx => {
        const input = await ctx.input({required: ['name']});
        if (!input.ok) {
          return input.outcome;
        }

        return `hello ${String(input.value.name)}`;
      }
    });

    expect(response.statusCode).toBe(400);
    expect(response.body.toString('utf8')).toBe('bad request');
  });

  it('binds the context to the task only while the handler runs', async () => {
    let seen: RequestContext | undefined;
    let bound: RequestContext | undefined;

    await dispatchRequest({
      environment: makeEnvironment(),
      handler: async ctx => {
        await delay(1);
        seen = ctx;
        bound = getRequestContext();
      }
    });

    expect(bound).toBe(seen);
    expect(seen).toBeDefined();
    expect(getRequestContext()).toBeUndefined();
    expect(getLogContext()).toBeUndefined();
  });

  it('keeps the logged route in step with mounted applications', async () => {
    const routes: Array<string | undefined> = [];

    await dispatchRequest({
      environment: makeEnvironment({PATH_INFO: '/blog/post'}),
      handler: ctx => {
        routes.push(getLogContext()?.route);
        ctx.enterApplication({name: 'blog', mountPath: '/blog'});
        routes.push(getLogContext()?.route);
        ctx.leaveApplication();
        routes.push(getLogContext()?.route);
      }
    });

    expect(routes).toEqual(['/blog/post', '/post', '/blog/post']);
  });

  it('keeps concurrent requests apart', async () => {
    const observe = async (ctx: RequestContext, wait: number) => {
      await delay(wait);
      return `${ctx.path}:${getRequestContext()?.path ?? 'none'}:${getLogContext()?.request_id ?? 'none'}`;
    };

    const [slow, fast] = await Promise.all([
      dispatchRequest({
        environment: makeEnvironment({PATH_INFO: '/slow'}),
        requestId: 'req_slow',
        handler: ctx => observe(ctx, 10)
      }),
      dispatchRequest({
        environment: makeEnvironment({PATH_INFO: '/fast'}),
        requestId: 'req_fast',
        handler: ctx => observe(ctx, 1)
      })
    ]);

    expect(slow.body.toString('utf8')).toBe('/slow:/slow:req_slow');
    expect(fast.body.toString('utf8')).toBe('/fast:/fast:req_fast');
  });

  it('maps unexpected errors to a logged 500 and drops headers queued before the failure', async () => {
    const buffered = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'gatewire-test',
      env: 'test',
      level: 'info',
      writer: buffered.writer,
      now: () => new Date('2026-01-01T00:00:00.000Z')
    });

    const response = await dispatchRequest({
      environment: makeEnvironment({PATH_INFO: '/boom', HTTP_COOKIE: 'sid=test-secret'}),
      requestId: 'req_boom',
      logger,
      now: () => new Date('2026-01-01T00:00:00.000Z'),
      handler: ctx => {
        ctx.header('X-Partial', 'yes');
        ctx.header('X-Broken', 'a\r\nInjected: 1');
        return 'unreachable';
      }
    });

    expect(response.status).toBe('500 Internal Server Error');
    expect(response.headers).toEqual([{name: 'Content-Type', value: 'text/html'}]);
    expect(response.body.toString('utf8')).toBe('internal server error');

    expect(buffered.stderr).toHaveLength(1);
    expect(JSON.parse(buffered.stderr[0])).toEqual({
      ts: '2026-01-01T00:00:00.000Z',
      level: 'error',
      service: 'gatewire-test',
      env: 'test',
      event: 'request.failed',
      component: 'webapi.dispatch',
      correlation_id: 'n/a',
      request_id: 'req_boom',
      message: 'Invalid characters in header "X-Broken"',
      reason_code: 'invalid_header',
      route: '/boom',
      method: 'GET',
      metadata: {error_name: 'InvalidHeaderError'}
    });

    expect(buffered.stdout).toHaveLength(1);
    expect(JSON.parse(buffered.stdout[0])).toMatchObject({
      event: 'request.completed',
      status_code: 500,
      duration_ms: 0,
      request_id: 'req_boom'
    });
  });

  it('logs completion without a status code when the status line has none', async () => {
    const buffered = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'gatewire-test',
      env: 'test',
      level: 'info',
      writer: buffered.writer,
      now: () => new Date('2026-01-01T00:00:00.000Z')
    });

    const response = await dispatchRequest({
      environment: makeEnvironment({PATH_INFO: '/custom'}),
      requestId: 'req_custom',
      logger,
      now: () => new Date('2026-01-01T00:00:00.000Z'),
      handler: ctx => {
        ctx.setStatus('custom');
        return 'done';
      }
    });

    expect(response.status).toBe('custom');
    expect(buffered.stdout).toHaveLength(1);
    const completed: unknown = JSON.parse(buffered.stdout[0]);
    expect(completed).toMatchObject({event: 'request.completed', duration_ms: 0, request_id: 'req_custom'});
    expect(completed).not.toHaveProperty('status_code');
  });

  it('uses the application error producer for failures', async () => {
    const logger = createMockLogger();
    const response = await dispatchRequest({
      environment: makeEnvironment(),
      logger,
      applications: [{name: 'site', internalError: ctx => internalError(ctx, 'site is down')}],
      handler: () => {
        throw new Error('database unavailable');
      }
    });

    expect(response.statusCode).toBe(500);
    expect(response.body.toString('utf8')).toBe('site is down');
    expect(logger.error).toHaveBeenCalledWith({
      event: 'request.failed',
      component: 'webapi.dispatch',
      reason_code: 'unhandled_error',
      message: 'database unavailable',
      metadata: {error_name: 'Error'}
    });
  });

  it('falls back to the default 500 when the producer fails', async () => {
    const logger = createMockLogger();
    const response = await dispatchRequest({
      environment: makeEnvironment(),
      logger,
      applications: [
        {
          internalError: () => {
            throw new Error('template missing');
          }
        }
      ],
      handler: () => {
        throw new Error('first failure');
      }
    });

    expect(response.body.toString('utf8')).toBe('internal server error');
    expect(logger.error).toHaveBeenCalledTimes(2);
  });

  it('releases uploads after the response is built', async () => {
    const tempDirectory = await mkdtemp(path.join(tmpdir(), 'gatewire-dispatch-'));
    try {
      const response = await dispatchRequest({
        environment: makeMultipartPost([{name: 'report', filename: 'r.txt', content: 'quarterly numbers'}]),
        config: {multipartMemoryLimitBytes: 4, uploadTempDirectory: tempDirectory},
        handler: async ctx => {
          const input = await ctx.input();
          const spilled = await readdir(tempDirectory);
          return `${input.ok ? Object.keys(input.value).join(',') : 'failed'}:${spilled.length}`;
        }
      });

      expect(response.body.toString('utf8')).toBe('report:1');
      expect(await readdir(tempDirectory)).toEqual([]);
    } finally {
      await rm(tempDirectory, {recursive: true, force: true});
    }
  });
});
