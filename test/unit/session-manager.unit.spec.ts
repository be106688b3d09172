/**
 * Unit tests for SessionManager
 *
 * The session factory is mocked; retries run on simulated time.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { AxiosError, AxiosHeaders } from 'axios';
import {
  AuthenticationError,
  ConnectionError,
  ManagerRequestError,
  OperationAbortedError,
  SessionError,
} from '../../src/errors';
import type { ManagerEndpoint } from '../../src/inventory/types';
import {
  SessionFactory,
  SessionManager,
  classifyConnectionFailure,
} from '../../src/session/session-manager';
import { FakeClock } from '../helpers/fake-clock';
import { FakeManagerClient } from '../helpers/fake-manager-client';
import { createTestLogger } from '../helpers/test-logger';

const endpoint: ManagerEndpoint = {
  url: 'https://manager.test',
  username: 'admin',
  password: 'test-secret',
  port: 443,
  verify: false,
};

function connectionRefused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 10.0.0.10:443'), { code: 'ECONNREFUSED' });
}

function axiosErrorWithStatus(status: number): AxiosError {
  return new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, {
    data: {},
    status,
    statusText: 'Unauthorized',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });
}

describe('SessionManager', () => {
  let clock: FakeClock;
  let client: FakeManagerClient;
  let factory: jest.Mock<SessionFactory>;

  function createManager(overrides: { maxRetries?: number; retryInterval?: number } = {}) {
    return new SessionManager(endpoint, {
      factory,
      clock,
      logger: createTestLogger('SessionManager'),
      maxRetries: overrides.maxRetries ?? 5,
      retryInterval: overrides.retryInterval ?? 1000,
    });
  }

  beforeEach(() => {
    clock = new FakeClock();
    client = new FakeManagerClient();
    factory = jest.fn<SessionFactory>().mockResolvedValue(client);
  });

  describe('connect', () => {
    it('should connect on the first attempt without sleeping', async () => {
      const manager = createManager();

      await expect(manager.connect()).resolves.toBe(client);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory).toHaveBeenCalledWith(endpoint);
      expect(clock.sleeps).toEqual([]);
      expect(manager.isConnected()).toBe(true);
      expect(manager.session).toBe(client);
    });

    it('should retry transient failures at the fixed interval', async () => {
      factory
        .mockRejectedValueOnce(connectionRefused())
        .mockRejectedValueOnce(new ManagerRequestError('Login returned 503', 503));
      const manager = createManager();

      await expect(manager.connect()).resolves.toBe(client);

      expect(factory).toHaveBeenCalledTimes(3);
      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('should fail immediately on rejected credentials', async () => {
      factory.mockRejectedValue(new ManagerRequestError("Unauthorized: login rejected for user 'admin'", 401));
      const manager = createManager();

      await expect(manager.connect()).rejects.toBeInstanceOf(AuthenticationError);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(clock.sleeps).toEqual([]);
      expect(manager.isConnected()).toBe(false);
    });

    it('should fail immediately on unexpected errors', async () => {
      factory.mockRejectedValue(new TypeError('Cannot read properties of undefined'));
      const manager = createManager();

      const error = await manager.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SessionError);
      expect(error).not.toBeInstanceOf(ConnectionError);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should raise ConnectionError with the last cause once retries are exhausted', async () => {
      const lastError = new ManagerRequestError('Login returned 502', 502);
      factory
        .mockRejectedValueOnce(connectionRefused())
        .mockRejectedValueOnce(connectionRefused())
        .mockRejectedValueOnce(lastError);
      const manager = createManager({ maxRetries: 3 });

      const error = await manager.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      if (!(error instanceof ConnectionError)) return;
      expect(error.attempts).toBe(3);
      expect(error.cause).toBe(lastError);
      expect(error.message).toBe('Failed to connect to manager after 3 attempts. Last error: Login returned 502');
      // no sleep after the final attempt
      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('should derive the attempt budget from a timeout override', async () => {
      factory.mockRejectedValue(connectionRefused());
      const manager = createManager({ maxRetries: 120, retryInterval: 30000 });

      await expect(manager.connect(90000)).rejects.toBeInstanceOf(ConnectionError);

      expect(factory).toHaveBeenCalledTimes(3);
    });

    it('should make at least one attempt for a timeout shorter than the interval', async () => {
      factory.mockRejectedValue(connectionRefused());
      const manager = createManager({ retryInterval: 30000 });

      await expect(manager.connect(1000)).rejects.toBeInstanceOf(ConnectionError);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should reuse the live session', async () => {
      const manager = createManager();

      await manager.connect();
      await manager.connect();

      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying when aborted', async () => {
      const controller = new AbortController();
      factory.mockImplementation(async () => {
        controller.abort();
        throw connectionRefused();
      });
      const manager = createManager();

      await expect(manager.connect(undefined, controller.signal)).rejects.toBeInstanceOf(OperationAbortedError);

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('close', () => {
    it('should log out once and be safe to repeat', async () => {
      const manager = createManager();
      await manager.connect();

      await manager.close();
      await manager.close();

      expect(client.logout).toHaveBeenCalledTimes(1);
      expect(manager.isConnected()).toBe(false);
    });

    it('should be a no-op without a session', async () => {
      const manager = createManager();

      await expect(manager.close()).resolves.toBeUndefined();
      expect(client.logout).not.toHaveBeenCalled();
    });

    it('should log a warning when logout fails', async () => {
      const logger = createTestLogger('SessionManager');
      const warn = jest.spyOn(logger, 'warn');
      client.logout.mockRejectedValueOnce(new Error('socket hang up'));
      const manager = new SessionManager(endpoint, { factory, clock, logger });
      await manager.connect();

      await expect(manager.close()).resolves.toBeUndefined();

      expect(warn).toHaveBeenCalledWith('Error while logging out of manager', { error: 'socket hang up' });
      expect(manager.isConnected()).toBe(false);
    });
  });

  describe('withSession', () => {
    it('should return the result and close the session', async () => {
      const manager = createManager();

      const result = await manager.withSession(async (session) => {
        expect(session).toBe(client);
        return 42;
      });

      expect(result).toBe(42);
      expect(client.logout).toHaveBeenCalledTimes(1);
      expect(manager.isConnected()).toBe(false);
    });

    it('should close the session when the callback fails', async () => {
      const manager = createManager();

      await expect(
        manager.withSession(async () => {
          throw new Error('phase failed');
        })
      ).rejects.toThrow('phase failed');

      expect(client.logout).toHaveBeenCalledTimes(1);
    });
  });
});

describe('classifyConnectionFailure', () => {
  it('should classify socket errors as transient', () => {
    expect(classifyConnectionFailure(connectionRefused())).toBe('transient');
  });

  it('should classify manager request errors by their auth signal', () => {
    expect(classifyConnectionFailure(new ManagerRequestError('Login returned 500', 500))).toBe('transient');
    expect(classifyConnectionFailure(new ManagerRequestError('Unauthorized: bad password'))).toBe('authentication');
    expect(classifyConnectionFailure(new ManagerRequestError('rejected', 401))).toBe('authentication');
  });

  it('should classify axios errors by response status', () => {
    expect(classifyConnectionFailure(new AxiosError('Network Error', 'ERR_NETWORK'))).toBe('transient');
    expect(classifyConnectionFailure(axiosErrorWithStatus(401))).toBe('authentication');
    expect(classifyConnectionFailure(axiosErrorWithStatus(503))).toBe('transient');
  });

  it('should classify anything else as fatal', () => {
    expect(classifyConnectionFailure(new RangeError('bad'))).toBe('fatal');
    expect(classifyConnectionFailure('oops')).toBe('fatal');
  });
});
