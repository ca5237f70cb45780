import { HttpException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import { BODY_ERROR_LOCAL, BodyErrorInterceptor } from './body-error.interceptor';

function contextWithLocals(locals: Record<string, unknown>) {
  return new ExecutionContextHost([{ headers: {} }, { locals }, () => undefined]);
}

describe('BodyErrorInterceptor', () => {
  const interceptor = new BodyErrorInterceptor();
  const handler = { handle: jest.fn(() => of('handled')) };

  beforeEach(() => handler.handle.mockClear());

  it('passes through when the body parsed', async () => {
    const out = interceptor.intercept(contextWithLocals({}), handler);

    await expect(lastValueFrom(out)).resolves.toBe('handled');
    expect(handler.handle).toHaveBeenCalledTimes(1);
  });

  it('raises the parked parse error instead of calling the handler', () => {
    const ctx = contextWithLocals({ [BODY_ERROR_LOCAL]: { status: 413, error: 'Request body too large' } });

    let thrown: unknown;
    try {
      interceptor.intercept(ctx, handler);
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(HttpException);
    if (!(thrown instanceof HttpException)) return;
    expect(thrown.getStatus()).toBe(413);
    expect(thrown.getResponse()).toEqual({ statusCode: 413, message: 'Request body too large', error: 'invalid_body' });
    expect(handler.handle).not.toHaveBeenCalled();
  });
});
