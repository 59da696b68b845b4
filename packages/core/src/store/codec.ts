/**
 * Line-oriented `KEY=VALUE` codec for the backing file.
 *
 * One key (the repository list) may span several lines: every line after it
 * that is not `KEY=`-shaped is folded into its value, one item per line.
 */

export type PersistedStore = Map<string, string>;

export const REPO_LIST_KEY = 'REPO_LIST';

export const DEFAULT_HEADER = [
  'bbsync backing file',
  'Fill required values. INSECURE=true by default.',
];

export type CodecOptions = {
  listKeys?: readonly string[];
};

export type SerializeOptions = CodecOptions & {
  header?: readonly string[];
};

export class FormatError extends Error {
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'FormatError';
    this.line = line;
  }
}

// Keys may carry dots and dashes; a leading `export ` is dropped.
const ENTRY_PATTERN = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=(.*)$/;
const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function isEntryLine(line: string): boolean {
  return ENTRY_PATTERN.test(line);
}

function isSkippable(trimmed: string): boolean {
  return trimmed === '' || trimmed.startsWith('#');
}

export function parseStore(text: string, options: CodecOptions = {}): PersistedStore {
  const listKeys = new Set(options.listKeys ?? [REPO_LIST_KEY]);
  const store: PersistedStore = new Map();
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  // Key currently collecting continuation lines, if any.
  let openList: string | undefined;

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (isSkippable(trimmed)) return;

    const match = ENTRY_PATTERN.exec(line);
    if (match) {
      const key = match[1] ?? '';
      const value = (match[2] ?? '').trim();
      store.set(key, value);
      openList = listKeys.has(key) ? key : undefined;
      return;
    }

    if (!openList) {
      throw new FormatError(`Unexpected line outside a KEY=VALUE entry: ${trimmed}`, index + 1);
    }
    const previous = store.get(openList) ?? '';
    store.set(openList, previous ? `${previous}\n${trimmed}` : trimmed);
  });

  return store;
}

export function serializeStore(store: ReadonlyMap<string, string>, options: SerializeOptions = {}): string {
  const listKeys = new Set(options.listKeys ?? [REPO_LIST_KEY]);
  const lines: string[] = [];

  if (options.header?.length) {
    for (const headerLine of options.header) {
      lines.push(`# ${headerLine}`);
    }
    lines.push('');
  }

  for (const [key, value] of store) {
    if (!KEY_PATTERN.test(key)) {
      throw new FormatError(`Invalid key: ${JSON.stringify(key)}`);
    }
    if (!listKeys.has(key)) {
      if (/[\r\n]/.test(value)) {
        throw new FormatError(`Value for ${key} must be a single line`);
      }
      lines.push(`${key}=${value.trim()}`);
      continue;
    }

    const items = value
      .split(/\r?\n/)
      .map((item) => item.trim())
      .filter((item) => item !== '');
    const [first = '', ...rest] = items;
    for (const item of rest) {
      if (isEntryLine(item)) {
        throw new FormatError(`List item for ${key} would be read back as an entry: ${item}`);
      }
      if (item.startsWith('#')) {
        throw new FormatError(`List item for ${key} would be read back as a comment: ${item}`);
      }
    }
    lines.push(`${key}=${first}`, ...rest);
  }

  return `${lines.join('\n')}\n`;
}
