import { CliUsageError, parseCliArgs } from './parse-cli-args';

describe('parseCliArgs', () => {
  const defaults = { input: './videos', output: './video_metadata.csv' };

  it('falls back to the defaults', () => {
    const command = parseCliArgs([], defaults);

    expect(command).toEqual({
      kind: 'run',
      options: { input: './videos', output: './video_metadata.csv' },
    });
  });

  it('reads --input and --output', () => {
    const command = parseCliArgs(
      ['--input', '/data/my videos', '--output=/data/out.csv'],
      defaults,
    );

    expect(command).toEqual({
      kind: 'run',
      options: { input: '/data/my videos', output: '/data/out.csv' },
    });
  });

  it('recognises help', () => {
    expect(parseCliArgs(['-h'], defaults)).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'], defaults)).toEqual({ kind: 'help' });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--recursive'], defaults)).toThrow(CliUsageError);
  });

  it('rejects positional arguments', () => {
    expect(() => parseCliArgs(['/data/videos'], defaults)).toThrow(CliUsageError);
  });

  it('rejects an empty input directory', () => {
    expect(() => parseCliArgs(['--input', ''], defaults)).toThrow(
      'input should not be empty',
    );
  });
});
