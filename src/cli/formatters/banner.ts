const BANNER_LINES = [
  '  __      _   _',
  ' / _| ___| |_| |_ ___ _ __ ___',
  "| |_ / _ \\ __| __/ _ \\ '__/ __|",
  '|  _|  __/ |_| ||  __/ |  \\__ \\',
  '|_|  \\___|\\__|\\__\\___|_|  |___/',
];

export function renderBanner(version: string): string {
  return [...BANNER_LINES, '', `  track your job applications · v${version}`].join('\n') + '\n';
}
