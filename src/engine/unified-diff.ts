/**
 * Unified diff rendering for the drift report.
 *
 * Produces git-style output: `a/` and `b/` path prefixes, `/dev/null` for
 * added and deleted files, and hunks with three lines of context.
 */

export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Largest LCS table computed for the changed middle of a file. Past it the
 * middle is rendered as a whole removal followed by a whole addition.
 */
export const MAX_LCS_CELLS = 4_000_000;

/** File content as read from disk or given as text. */
export type FileContent = string | Buffer;

const NO_NEWLINE_MARKER = '\\ No newline at end of file';

interface Line {
  text: string;
  /** Last line of a file that does not end with a newline. */
  noEol: boolean;
}

type OpType = ' ' | '-' | '+';

interface Op {
  type: OpType;
  line: Line;
}

function splitLines(content: string): Line[] {
  if (content.length === 0) return [];
  const parts = content.split('\n');
  const endsWithNewline = parts[parts.length - 1] === '';
  if (endsWithNewline) parts.pop();
  return parts.map((text, i) => ({ text, noEol: !endsWithNewline && i === parts.length - 1 }));
}

function sameLine(a: Line, b: Line): boolean {
  return a.text === b.text && a.noEol === b.noEol;
}

/** Edit script via longest common subsequence, after trimming the common prefix and suffix. */
function diffLines(a: Line[], b: Line[]): Op[] {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && sameLine(a[prefix], b[prefix])) prefix++;
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    sameLine(a[a.length - 1 - suffix], b[b.length - 1 - suffix])
  ) {
    suffix++;
  }

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);
  const n = midA.length;
  const m = midB.length;
  const ops: Op[] = a.slice(0, prefix).map((line) => ({ type: ' ', line }));
  const tail: Op[] = a.slice(a.length - suffix).map((line) => ({ type: ' ', line }));

  if (n * m > MAX_LCS_CELLS) {
    for (const line of midA) ops.push({ type: '-', line });
    for (const line of midB) ops.push({ type: '+', line });
    return [...ops, ...tail];
  }

  const width = m + 1;
  const lcs = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] = sameLine(midA[i], midB[j])
        ? lcs[(i + 1) * width + j + 1] + 1
        : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    if (i < n && j < m && sameLine(midA[i], midB[j])) {
      ops.push({ type: ' ', line: midA[i] });
      i++;
      j++;
    } else if (j >= m || (i < n && lcs[(i + 1) * width + j] >= lcs[i * width + j + 1])) {
      ops.push({ type: '-', line: midA[i] });
      i++;
    } else {
      ops.push({ type: '+', line: midB[j] });
      j++;
    }
  }
  return [...ops, ...tail];
}

function range(start: number, count: number): string {
  return count === 1 ? `${start}` : `${start},${count}`;
}

function renderHunks(ops: Op[], context: number): string[] {
  const changes: number[] = [];
  ops.forEach((op, index) => {
    if (op.type !== ' ') changes.push(index);
  });

  // Position of each op in the old and new file, before the op is applied.
  const oldPos: number[] = [];
  const newPos: number[] = [];
  let o = 0;
  let nn = 0;
  for (const op of ops) {
    oldPos.push(o);
    newPos.push(nn);
    if (op.type !== '+') o++;
    if (op.type !== '-') nn++;
  }

  const out: string[] = [];
  let c = 0;
  while (c < changes.length) {
    let last = changes[c];
    const start = Math.max(0, changes[c] - context);
    while (c + 1 < changes.length && changes[c + 1] - last - 1 <= context * 2) {
      c++;
      last = changes[c];
    }
    c++;
    const end = Math.min(ops.length, last + context + 1);

    const hunk = ops.slice(start, end);
    const oldCount = hunk.filter((op) => op.type !== '+').length;
    const newCount = hunk.filter((op) => op.type !== '-').length;
    const oldStart = oldCount > 0 ? oldPos[start] + 1 : oldPos[start];
    const newStart = newCount > 0 ? newPos[start] + 1 : newPos[start];

    out.push(`@@ -${range(oldStart, oldCount)} +${range(newStart, newCount)} @@`);
    for (const op of hunk) {
      out.push(`${op.type}${op.line.text}`);
      if (op.line.noEol) out.push(NO_NEWLINE_MARKER);
    }
  }
  return out;
}

function toBuffer(content: FileContent): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
}

/** Byte-for-byte equality; `null` (absent) equals only `null`. */
export function sameContent(a: FileContent | null, b: FileContent | null): boolean {
  if (a === null || b === null) return a === b;
  return toBuffer(a).equals(toBuffer(b));
}

/** NUL bytes or bytes that are not valid UTF-8. */
function isBinary(content: FileContent | null): boolean {
  if (content === null) return false;
  const bytes = toBuffer(content);
  return bytes.includes(0) || !Buffer.from(bytes.toString('utf8'), 'utf8').equals(bytes);
}

function toText(content: FileContent | null): string {
  if (content === null) return '';
  return typeof content === 'string' ? content : content.toString('utf8');
}

/**
 * Render the diff of one file. `null` content means the file is absent on
 * that side. Returns an empty string when both sides are identical.
 */
export function unifiedDiff(
  filePath: string,
  before: FileContent | null,
  after: FileContent | null,
  context: number = DEFAULT_CONTEXT_LINES,
): string {
  if (sameContent(before, after)) return '';

  const header = [`diff --git a/${filePath} b/${filePath}`];
  if (before === null) header.push('new file mode 100644');
  if (after === null) header.push('deleted file mode 100644');

  const fromName = before === null ? '/dev/null' : `a/${filePath}`;
  const toName = after === null ? '/dev/null' : `b/${filePath}`;

  if (isBinary(before) || isBinary(after)) {
    return [...header, `Binary files ${fromName} and ${toName} differ`].join('\n') + '\n';
  }

  const ops = diffLines(splitLines(toText(before)), splitLines(toText(after)));
  const hunks = renderHunks(ops, context);
  return [...header, `--- ${fromName}`, `+++ ${toName}`, ...hunks].join('\n') + '\n';
}
