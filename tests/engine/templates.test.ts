import path from 'path';
import { renderCommand, renderTemplate, targetVars } from '../../src/engine/templates';

describe('Command templates', () => {
  test('known placeholders are replaced', () => {
    expect(renderTemplate('--target {target} -F {features}', { target: 'aarch64-apple-darwin', features: 'default' })).toBe(
      '--target aarch64-apple-darwin -F default',
    );
  });

  test('unknown placeholders are left as written', () => {
    expect(renderTemplate('{known}-{unknown}', { known: 'x' })).toBe('x-{unknown}');
  });

  test('renderCommand resolves cwd against the workspace root', () => {
    const spec = renderCommand(
      { name: 'compile', command: 'cargo', args: ['build', '--target', '{target}'], cwd: 'crates/{os}', env: { OUT: '{arch}' } },
      { target: 't', os: 'linux', arch: 'arm64' },
      '/work',
    );
    expect(spec).toEqual({
      name: 'compile',
      command: 'cargo',
      args: ['build', '--target', 't'],
      cwd: path.resolve('/work', 'crates/linux'),
      env: { OUT: 'arm64' },
    });
  });

  test('renderCommand defaults cwd to the workspace root', () => {
    const spec = renderCommand({ name: 'lint', command: 'cargo' }, {}, '/work');
    expect(spec.cwd).toBe('/work');
    expect(spec.args).toEqual([]);
    expect(spec.env).toEqual({});
  });

  test('targetVars describes a target', () => {
    expect(targetVars({ operatingSystem: 'linux', cpuArchitecture: 'x86_64', featureSet: ['jemalloc', 'tls'] }, 'x86_64-unknown-linux-gnu')).toEqual({
      os: 'linux',
      arch: 'x86_64',
      features: 'jemalloc,tls',
      target: 'x86_64-unknown-linux-gnu',
    });
  });

  test('targetVars falls back to arch-os and default features', () => {
    expect(targetVars({ operatingSystem: 'macos', cpuArchitecture: 'arm64', featureSet: [] })).toEqual({
      os: 'macos',
      arch: 'arm64',
      features: 'default',
      target: 'arm64-macos',
    });
    expect(targetVars(null)).toEqual({});
  });
});
