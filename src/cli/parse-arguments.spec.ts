import { CliUsageError, parseArguments } from './parse-arguments';

describe('parseArguments', () => {
  it('reads topic, level and options for a generation run', () => {
    expect(
      parseArguments([
        'Congruence of Triangles',
        'Class 7',
        '--count',
        '10',
        '--output-dir',
        'out',
      ]),
    ).toEqual({
      mode: 'generate',
      options: {
        topic: 'Congruence of Triangles',
        level: 'Class 7',
        count: 10,
        outputDir: 'out',
      },
    });
  });

  it('leaves the count to configuration when it is not given', () => {
    const command = parseArguments(['Fractions', 'Class 5']);

    expect(command).toEqual({
      mode: 'generate',
      options: {
        topic: 'Fractions',
        level: 'Class 5',
        count: undefined,
        outputDir: undefined,
      },
    });
  });

  it('switches to render mode with --from-json', () => {
    expect(parseArguments(['--from-json', 'paper.json'])).toEqual({
      mode: 'render',
      options: {
        metadataPath: 'paper.json',
        topic: undefined,
        level: undefined,
        outputDir: undefined,
      },
    });
  });

  it('passes topic and level as overrides in render mode', () => {
    const command = parseArguments([
      'Fractions',
      'Class 6',
      '--from-json',
      'paper.json',
    ]);

    expect(command).toMatchObject({
      mode: 'render',
      options: {
        metadataPath: 'paper.json',
        topic: 'Fractions',
        level: 'Class 6',
      },
    });
  });

  it('returns help for --help', () => {
    expect(parseArguments(['Fractions', '--help'])).toEqual({ mode: 'help' });
  });

  it.each([
    ['a missing level', ['Fractions']],
    [
      'a count that is not a number',
      ['Fractions', 'Class 5', '--count', 'many'],
    ],
    ['a count above the limit', ['Fractions', 'Class 5', '--count', '101']],
    ['an option without a value', ['Fractions', 'Class 5', '--count']],
    ['an unknown option', ['Fractions', 'Class 5', '--verbose']],
    ['too many positionals', ['Fractions', 'Class 5', 'extra']],
  ])('rejects %s', (_label, args) => {
    expect(() => parseArguments(args)).toThrow(CliUsageError);
  });
});
