import {
  escapeMarkdownV2,
  parseCommandArgument,
  splitMessage,
} from './telegram-format';

describe('escapeMarkdownV2', () => {
  it('escapes MarkdownV2 control characters', () => {
    expect(escapeMarkdownV2('a_b*c [x](y) 1.5! -2')).toBe(
      'a\\_b\\*c \\[x\\]\\(y\\) 1\\.5\\! \\-2',
    );
  });

  it('escapes backslashes', () => {
    expect(escapeMarkdownV2('C:\\path')).toBe('C:\\\\path');
  });

  it('returns an empty string for empty input', () => {
    expect(escapeMarkdownV2('')).toBe('');
  });
});

describe('parseCommandArgument', () => {
  it('returns the text after the command', () => {
    expect(parseCommandArgument('/weather Paris, FR')).toBe('Paris, FR');
  });

  it('handles commands addressed to the bot by name', () => {
    expect(parseCommandArgument('/weather@WeatherBot   Lahore ')).toBe('Lahore');
  });

  it('returns an empty string when no argument was given', () => {
    expect(parseCommandArgument('/weather')).toBe('');
  });
});

describe('splitMessage', () => {
  it('keeps a short message whole', () => {
    expect(splitMessage('Sunny in Lahore.')).toEqual(['Sunny in Lahore.']);
  });

  it('breaks at the last space that fits', () => {
    expect(splitMessage('aaaa bbbb cccc', 10)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('cuts at the limit when there is nowhere to break', () => {
    expect(splitMessage('x'.repeat(25), 10)).toEqual([
      'x'.repeat(10),
      'x'.repeat(10),
      'x'.repeat(5),
    ]);
  });

  it('splits at the Telegram limit by default', () => {
    expect(splitMessage('x'.repeat(5000)).map((chunk) => chunk.length)).toEqual([
      4096, 904,
    ]);
  });
});
