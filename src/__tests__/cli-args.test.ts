import { describe, expect, it } from 'vitest';
import { DEFAULT_TEMPLATE_ID, getArgValue, parseCliArgs } from '@/lib/cli-args';

describe('parseCliArgs', () => {
  it('parses a generate command with parameter flags', () => {
    expect(
      parseCliArgs(['generate', 'in.jpg', 'out.png', '--template=doomer', '--face=0.5', '--contrast', '1.3']),
    ).toEqual({
      command: 'generate',
      input: 'in.jpg',
      output: 'out.png',
      templateId: 'doomer',
      params: { faceBlendStrength: 0.5, contrastEnhancement: 1.3 },
      directory: undefined,
    });
  });

  it('defaults the template', () => {
    const cli = parseCliArgs(['generate', 'a.png', 'b.png']);
    expect(cli).toMatchObject({ command: 'generate', templateId: DEFAULT_TEMPLATE_ID, params: {} });
  });

  it('passes unparseable numbers on for validation', () => {
    const cli = parseCliArgs(['generate', 'a.png', 'b.png', '--eye=lots']);
    expect(cli.command === 'generate' && Number.isNaN(cli.params.eyeBlendStrength)).toBe(true);
  });

  it('parses list-templates with a directory', () => {
    expect(parseCliArgs(['list-templates', '--templates=/srv/templates'])).toEqual({
      command: 'list-templates',
      directory: '/srv/templates',
    });
  });

  it('falls back to help', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help', error: undefined });
    expect(parseCliArgs(['remix'])).toEqual({ command: 'help', error: "Unknown command 'remix'" });
    expect(parseCliArgs(['generate', 'only-input.png'])).toEqual({
      command: 'help',
      error: 'generate needs an input and an output path',
    });
  });
});

describe('getArgValue', () => {
  it('reads both --flag=value and --flag value', () => {
    expect(getArgValue(['--a=1', '--b', '2'], 'a')).toBe('1');
    expect(getArgValue(['--a=1', '--b', '2'], 'b')).toBe('2');
    expect(getArgValue(['--b', '--c'], 'b')).toBeUndefined();
  });
});
