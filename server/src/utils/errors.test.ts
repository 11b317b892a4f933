import {
  AppError,
  ValidationError,
  ConfigError,
  NotFoundError,
  LogWriteError,
  getExitCode,
  errorMessage,
  describeProbeError,
} from './errors';

describe('Error classes', () => {
  describe('AppError', () => {
    it('should default to exit code 1 and operational', () => {
      const error = new AppError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.exitCode).toBe(1);
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    it('should allow non-operational errors', () => {
      const error = new AppError('Test error', 3, false);
      expect(error.exitCode).toBe(3);
      expect(error.isOperational).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should include field name', () => {
      const error = new ValidationError('Invalid input', 'name');
      expect(error.field).toBe('name');
      expect(error).toBeInstanceOf(AppError);
    });
  });

  describe('ConfigError', () => {
    it('should be a ValidationError', () => {
      const error = new ConfigError('MONITOR_URL is required', 'MONITOR_URL');
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.name).toBe('ConfigError');
      expect(error.field).toBe('MONITOR_URL');
    });
  });

  describe('NotFoundError', () => {
    it('should format the resource name', () => {
      expect(new NotFoundError('Monitor').message).toBe('Monitor not found');
    });

    it('should append detail when given', () => {
      const error = new NotFoundError('Monitor', '/var/logs/ghost');
      expect(error.message).toBe('Monitor not found: /var/logs/ghost');
      expect(error.resource).toBe('Monitor');
    });
  });

  describe('LogWriteError', () => {
    it('should carry path, cause and exit code 2', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new LogWriteError('/logs/demo/2026/01/2026-01-15.log', cause);
      expect(error.message).toBe(
        'Failed to write log file /logs/demo/2026/01/2026-01-15.log: EACCES: permission denied',
      );
      expect(error.path).toBe('/logs/demo/2026/01/2026-01-15.log');
      expect(error.cause).toBe(cause);
      expect(error.exitCode).toBe(2);
      expect(error.isOperational).toBe(false);
    });
  });
});

describe('getExitCode', () => {
  it('should use the AppError exit code', () => {
    expect(getExitCode(new LogWriteError('/x', 'disk full'))).toBe(2);
  });

  it('should return 1 for other errors', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode('boom')).toBe(1);
  });
});

describe('errorMessage', () => {
  it('should read Error messages and stringify other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('describeProbeError', () => {
  it('should map a refused connection found in the cause chain', () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:80'), { code: 'ECONNREFUSED' });
    const error = new TypeError('fetch failed', { cause });
    expect(describeProbeError(error)).toBe('Connection refused');
  });

  it('should map DNS failures', () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.invalid'), { code: 'ENOTFOUND' });
    expect(describeProbeError(new TypeError('fetch failed', { cause }))).toBe('DNS lookup failed');
  });

  it('should map certificate errors', () => {
    expect(describeProbeError(new Error('self-signed certificate in chain'))).toBe('TLS certificate error');
  });

  it('should return the top-level message for unknown errors', () => {
    expect(describeProbeError(new Error('something odd'))).toBe('something odd');
  });

  it('should truncate long messages', () => {
    const result = describeProbeError(new Error('x'.repeat(250)));
    expect(result).toBe('x'.repeat(200) + '...');
  });

  it('should stringify non-Error values', () => {
    expect(describeProbeError('weird')).toBe('weird');
  });
});
