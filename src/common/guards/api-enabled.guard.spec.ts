import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ApiEnabledGuard } from './api-enabled.guard';

describe('ApiEnabledGuard', () => {
  const context = new ExecutionContextHost([{ method: 'GET', url: '/tracks' }, {}]);

  it('should let requests through when the API is enabled', () => {
    const guard = new ApiEnabledGuard(new ConfigService({ api: { enabled: true } }));
    expect(guard.canActivate(context)).toBe(true);
  });

  it('should answer 404 when the API is disabled', () => {
    const guard = new ApiEnabledGuard(new ConfigService({ api: { enabled: false } }));
    expect(() => guard.canActivate(context)).toThrow(NotFoundException);
  });

  it('should not block WebSocket traffic', () => {
    const guard = new ApiEnabledGuard(new ConfigService({ api: { enabled: false } }));
    const ws = new ExecutionContextHost([{}, {}]);
    ws.setType('ws');
    expect(guard.canActivate(ws)).toBe(true);
  });
});
