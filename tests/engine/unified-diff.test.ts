import { MAX_LCS_CELLS, sameContent, unifiedDiff } from '../../src/engine/unified-diff';

describe('Unified diff', () => {
  test('identical content yields nothing', () => {
    expect(unifiedDiff('gen/a.rs', 'x\n', 'x\n')).toBe('');
  });

  test('modified line with context', () => {
    expect(unifiedDiff('gen/a.rs', 'a\nb\nc\n', 'a\nB\nc\n')).toBe(
      [
        'diff --git a/gen/a.rs b/gen/a.rs',
        '--- a/gen/a.rs',
        '+++ b/gen/a.rs',
        '@@ -1,3 +1,3 @@',
        ' a',
        '-b',
        '+B',
        ' c',
        '',
      ].join('\n'),
    );
  });

  test('added file diffs against /dev/null', () => {
    expect(unifiedDiff('gen/new.rs', null, 'one\ntwo\n')).toBe(
      [
        'diff --git a/gen/new.rs b/gen/new.rs',
        'new file mode 100644',
        '--- /dev/null',
        '+++ b/gen/new.rs',
        '@@ -0,0 +1,2 @@',
        '+one',
        '+two',
        '',
      ].join('\n'),
    );
  });

  test('deleted file diffs against /dev/null', () => {
    expect(unifiedDiff('gen/old.rs', 'gone\n', null)).toBe(
      [
        'diff --git a/gen/old.rs b/gen/old.rs',
        'deleted file mode 100644',
        '--- a/gen/old.rs',
        '+++ /dev/null',
        '@@ -1 +0,0 @@',
        '-gone',
        '',
      ].join('\n'),
    );
  });

  test('context is limited to three lines', () => {
    const before = ['1', '2', '3', '4', '5', '6', '7', '8', '9'].join('\n') + '\n';
    const after = ['1', '2', '3', '4', 'five', '6', '7', '8', '9'].join('\n') + '\n';
    const lines = unifiedDiff('f', before, after).split('\n');
    expect(lines[3]).toBe('@@ -2,7 +2,7 @@');
    expect(lines.slice(4, 12)).toEqual([' 2', ' 3', ' 4', '-5', '+five', ' 6', ' 7', ' 8']);
  });

  test('distant changes produce separate hunks', () => {
    const before = Array.from({ length: 20 }, (_, i) => `line${i + 1}`);
    const after = [...before];
    after[0] = 'first';
    after[19] = 'last';
    const diff = unifiedDiff('f', before.join('\n') + '\n', after.join('\n') + '\n');
    const headers = diff.split('\n').filter((l) => l.startsWith('@@'));
    expect(headers).toEqual(['@@ -1,4 +1,4 @@', '@@ -17,4 +17,4 @@']);
  });

  test('missing trailing newline is marked', () => {
    const diff = unifiedDiff('f', 'a\n', 'a');
    expect(diff.split('\n').slice(3)).toEqual([
      '@@ -1 +1 @@',
      '-a',
      '+a',
      '\\ No newline at end of file',
      '',
    ]);
  });

  test('invalid UTF-8 is treated as binary', () => {
    const diff = unifiedDiff('gen/desc.bin', Buffer.from([0x01, 0xff, 0x02]), Buffer.from([0x01, 0xfe, 0x02]));
    expect(diff).toBe('diff --git a/gen/desc.bin b/gen/desc.bin\nBinary files a/gen/desc.bin and b/gen/desc.bin differ\n');
  });

  test('buffers are compared by bytes', () => {
    expect(sameContent(Buffer.from([0xff]), Buffer.from([0xfe]))).toBe(false);
    expect(sameContent(Buffer.from('x\n'), 'x\n')).toBe(true);
    expect(sameContent(null, '')).toBe(false);
    expect(unifiedDiff('f', Buffer.from('x\n'), 'x\n')).toBe('');
  });

  test('a rewrite too large for the LCS table becomes a whole replacement', () => {
    const count = 2_100;
    expect(count * count).toBeGreaterThan(MAX_LCS_CELLS);
    const before = Array.from({ length: count }, (_, i) => `a${i}`).join('\n') + '\n';
    const after = Array.from({ length: count }, (_, i) => `b${i}`).join('\n') + '\n';

    const lines = unifiedDiff('big.txt', before, after).split('\n');

    expect(lines.slice(0, 5)).toEqual([
      'diff --git a/big.txt b/big.txt',
      '--- a/big.txt',
      '+++ b/big.txt',
      '@@ -1,2100 +1,2100 @@',
      '-a0',
    ]);
    expect(lines[count + 3]).toBe('-a2099');
    expect(lines[count + 4]).toBe('+b0');
    expect(lines).toHaveLength(4 + 2 * count + 1);
  });
});
