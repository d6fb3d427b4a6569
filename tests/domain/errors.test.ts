import {
  createTypedError,
  buildError,
  driftError,
  jobTimeoutError,
  jobCanceledError,
  cacheError,
  configurationError,
  notFoundError,
  toolchainError,
  apiError,
  describeError,
  ConfigurationError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('buildError names the step and exit code', () => {
    const error = buildError('build:linux-x86_64', 'compile', 101, 'error[E0308]');
    expect(error.code).toBe('BUILD.COMMAND_FAILED');
    expect(error.message).toBe('Step "compile" exited with code 101');
    expect(error.jobId).toBe('build:linux-x86_64');
    expect(error.details).toEqual({ step: 'compile', exitCode: 101, stderrTail: 'error[E0308]' });
  });

  test('buildError for a command that never started', () => {
    expect(buildError('lint', 'lint', null).message).toBe('Step "lint" could not be started');
  });

  test('driftError lists changed paths and suggests regeneration', () => {
    const error = driftError('codegen-check', ['gen/a.rs', 'gen/b.rs']);
    expect(error.code).toBe('CODEGEN.DRIFT');
    expect(error.message).toBe('Generated code differs from the committed tree in 2 path(s)');
    expect(error.suggestedFixes[0].type).toBe('REGENERATE');
  });

  test('timeouts and cancellations are retryable', () => {
    const timeout = jobTimeoutError('test', 1000);
    expect(timeout.retryable).toBe(true);
    expect(timeout.suggestedFixes[0].params).toEqual({ timeoutMs: 2000 });
    expect(jobCanceledError('test', 'superseded').message).toBe('Job canceled: superseded');
    expect(jobCanceledError('test').details).toBeUndefined();
  });

  test('cache errors carry the operation in the code', () => {
    expect(cacheError('restore', 'k', 'x').code).toBe('CACHE.RESTORE_FAILED');
    expect(cacheError('save', 'k', 'x').code).toBe('CACHE.SAVE_FAILED');
  });

  test('toolchainError merges capability into details', () => {
    const error = toolchainError('build:linux-arm64', 'protoc', 'not found', { exitCode: 127 });
    expect(error.message).toBe('Toolchain provisioning failed for protoc: not found');
    expect(error.details).toEqual({ capability: 'protoc', exitCode: 127 });
  });

  test('notFoundError factory', () => {
    const error = notFoundError('Pipeline', 'pl_1');
    expect(error.code).toBe('VALIDATION.NOT_FOUND');
    expect(error.message).toBe('Pipeline not found: pl_1');
  });

  test('apiError wraps typed error', () => {
    const typed = createTypedError({ code: 'TEST', message: 'test' });
    expect(apiError(typed)).toEqual({ error: typed });
  });

  test('describeError handles non-Error values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('ConfigurationError', () => {
  test('exposes the problems it was built from', () => {
    const err = new ConfigurationError(configurationError('Invalid matrix', { problems: ['a', 'b'] }));
    expect(err.name).toBe('ConfigurationError');
    expect(err.message).toBe('Invalid matrix');
    expect(err.problems).toEqual(['a', 'b']);
  });

  test('problems is empty without details', () => {
    expect(new ConfigurationError(configurationError('bad')).problems).toEqual([]);
  });
});
