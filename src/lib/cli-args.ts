export type CliCommand =
  | { command: 'generate'; input: string; output: string; templateId: string; params: Record<string, number>; directory?: string }
  | { command: 'list-templates'; directory?: string }
  | { command: 'help'; error?: string };

export const DEFAULT_TEMPLATE_ID = 'wojak_basic';

// CLI flag -> generation parameter
const PARAM_FLAGS = {
  face: 'faceBlendStrength',
  eye: 'eyeBlendStrength',
  mouth: 'mouthBlendStrength',
  nose: 'noseBlendStrength',
  color: 'colorMatchStrength',
  contrast: 'contrastEnhancement',
} as const;

export const USAGE = `Usage:
  generate <input> <output> [--template=<id>] [--face=0.6] [--eye=0.8] [--mouth=0.7] [--nose=0.3] [--color=0.4] [--contrast=1.1] [--templates=<dir>]
  list-templates [--templates=<dir>]`;

export const getArgValue = (argv: readonly string[], flag: string): string | undefined => {
  const prefix = `--${flag}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token.startsWith(prefix)) return token.slice(prefix.length);
    if (token === `--${flag}` && i + 1 < argv.length) {
      const next = argv[i + 1];
      if (!next.startsWith('--')) return next;
    }
  }
  return undefined;
};

function positionals(argv: readonly string[]) {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token.startsWith('--')) {
      // `--flag value` consumes the next token
      if (!token.includes('=') && i + 1 < argv.length && !argv[i + 1].startsWith('--')) i += 1;
      continue;
    }
    out.push(token);
  }
  return out;
}

/**
 * Parse `process.argv.slice(2)`. Parameter values are handed on as numbers
 * (NaN when unparseable) and validated by the generator.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = positionals(argv);
  const directory = getArgValue(argv, 'templates');
  if (command === 'list-templates') return { command, directory };
  if (command !== 'generate') {
    return { command: 'help', error: command ? `Unknown command '${command}'` : undefined };
  }
  const [input, output] = rest;
  if (!input || !output) return { command: 'help', error: 'generate needs an input and an output path' };

  const params: Record<string, number> = {};
  for (const [flag, key] of Object.entries(PARAM_FLAGS)) {
    const raw = getArgValue(argv, flag);
    if (raw !== undefined) params[key] = raw.trim() === '' ? Number.NaN : Number(raw);
  }
  return { command, input, output, templateId: getArgValue(argv, 'template') ?? DEFAULT_TEMPLATE_ID, params, directory };
}
