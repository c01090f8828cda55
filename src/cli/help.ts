import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('ff')} ${dimText('- interactive fuzzy finder')}`
    : 'ff - interactive fuzzy finder';

  const lines = [
    title,
    '',
    'Usage: ff [options] [<file> | <item>...]',
    '',
    formatSection('Input', [
      ['<file>', 'Read items from a file, one per line'],
      ['<item>...', 'Use the arguments themselves as items'],
      ['(none)', 'Stream items from standard input'],
    ]),
    '',
    formatSection('Options', [
      ['--multi-select, -m', 'Select several items (Tab/Space toggles)'],
      ['--height <lines>', 'Draw inline using this many rows'],
      ['--height-percentage <percent>', 'Draw inline using this share of the terminal'],
      ['--prompt <text>', "Prompt shown before the query (default '> ')"],
      ['--query <text>', 'Start with this query'],
      ['--no-help', 'Hide the key help line'],
      ['--config, -c <path>', 'Path to config file'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys', [
      ['Up/Down, Ctrl-P/Ctrl-N', 'Move the cursor'],
      ['PageUp/PageDown', 'Move by one page'],
      ['Enter', 'Confirm'],
      ['Tab, Space', 'Toggle the item (multi-select)'],
      ['Esc, Ctrl-C, Ctrl-Q', 'Exit without selecting'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .ffrc.json (walks up from cwd)'],
      ['Global config', '~/.config/ff/config.json'],
      ['NO_COLOR', 'Disables colors when set'],
    ]),
    '',
    dimText('Selected items are printed to stdout, one per line. Exit status is 1 when cancelled.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
