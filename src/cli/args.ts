export interface CliOptions {
  useBrowser: boolean;
  help: boolean;
  unknown: string[];
}

export const USAGE = [
  'Usage: speech-search [--usebrowser] [--help]',
  '',
  'Listens to the microphone and searches the web for what you say.',
  '',
  'Voice commands:',
  '  <anything>   Search for it and read the first result aloud',
  '  next         Read the next result',
  '  exit, quit   Stop listening',
  '',
  'Options:',
  '  --usebrowser  Open results in the default browser instead of reading them',
  '  --help        Print this message',
  ''
].join('\n');

export const parseCliArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = { useBrowser: false, help: false, unknown: [] };

  for (const arg of argv) {
    if (arg === '--usebrowser') {
      options.useBrowser = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      options.unknown.push(arg);
    }
  }

  return options;
};
