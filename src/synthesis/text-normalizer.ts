/**
 * Text Normalizer
 * Rewrites assistant text into words a synthesizer reads naturally.
 */

import { toWords, toWordsOrdinal } from 'number-to-words';

type Rule = (text: string) => string;

const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\bDr\./g, 'Doctor'],
  [/\bMr\./g, 'Mister'],
  [/\bMrs\./g, 'Missus'],
  [/\bMs\./g, 'Miss'],
  [/\bProf\./g, 'Professor'],
  [/\bvs\./gi, 'versus'],
  [/\betc\./gi, 'etcetera'],
  [/\be\.g\./gi, 'for example'],
  [/\bi\.e\./gi, 'that is'],
  [/\bapprox\./gi, 'approximately'],
];

function int(value: string): number {
  return parseInt(value, 10);
}

function plural(count: number, unit: string): string {
  return `${toWords(count)} ${unit}${count === 1 ? '' : 's'}`;
}

/** "1,200" reads as one number */
const joinThousands: Rule = (text) => text.replace(/(\d),(?=\d{3}\b)/g, '$1');

/** 3:45 PM → three forty-five P M; 7:00 → seven o'clock */
const speakTimes: Rule = (text) =>
  text.replace(/\b(\d{1,2}):(\d{2})(?:\s*([AaPp])(?:\.[Mm]\.|[Mm]\b))?/g, (_, hour: string, minute: string, period?: string) => {
    const m = int(minute);
    const suffix = period ? ` ${period.toUpperCase()} M` : '';
    if (m === 0) return `${toWords(int(hour))}${period ? '' : " o'clock"}${suffix}`;
    const minuteWords = m < 10 ? `oh ${toWords(m)}` : toWords(m);
    return `${toWords(int(hour))} ${minuteWords}${suffix}`;
  });

const speakCurrency: Rule = (text) =>
  text.replace(/\$(\d+)(?:\.(\d{2}))?\b/g, (_, dollars: string, cents?: string) => {
    const spoken = plural(int(dollars), 'dollar');
    const c = cents ? int(cents) : 0;
    return c > 0 ? `${spoken} and ${plural(c, 'cent')}` : spoken;
  });

/** Leaves the digits for the number rules that follow */
const speakPercentages: Rule = (text) => text.replace(/(\d+(?:\.\d+)?)\s?%/g, '$1 percent');

const speakDecimals: Rule = (text) =>
  text.replace(/\b(\d+)\.(\d+)\b/g, (_, whole: string, fraction: string) => {
    const digits = fraction
      .split('')
      .map((digit) => toWords(int(digit)))
      .join(' ');
    return `${toWords(int(whole))} point ${digits}`;
  });

const speakOrdinals: Rule = (text) =>
  text.replace(/\b(\d+)(?:st|nd|rd|th)\b/gi, (_, value: string) => toWordsOrdinal(int(value)));

/** 1984 → nineteen eighty-four, 2007 → two thousand seven, 2024 → twenty twenty-four */
const speakYears: Rule = (text) =>
  text.replace(/\b(1[1-9]|20)(\d{2})\b/g, (match: string, century: string, rest: string) => {
    const year = int(match);
    const last = int(rest);
    if (year >= 2000 && year < 2010) {
      return year === 2000 ? 'two thousand' : `two thousand ${toWords(last)}`;
    }
    if (last === 0) return `${toWords(int(century))} hundred`;
    return `${toWords(int(century))} ${last < 10 ? `oh ${toWords(last)}` : toWords(last)}`;
  });

const speakIntegers: Rule = (text) => text.replace(/\b\d+\b/g, (match) => toWords(int(match)));

const expandAbbreviations: Rule = (text) =>
  ABBREVIATIONS.reduce((result, [pattern, spoken]) => result.replace(pattern, spoken), text);

const speakSymbols: Rule = (text) =>
  text
    .replace(/&/g, ' and ')
    .replace(/@/g, ' at ')
    .replace(/\+/g, ' plus ')
    .replace(/=/g, ' equals ')
    .replace(/#(\w+)/g, 'hashtag $1')
    .replace(/#/g, ' number ');

/** Markdown and quoting that synthesizers read aloud or stumble on */
const cleanPunctuation: Rule = (text) =>
  text
    .replace(/\.\.\./g, ', ')
    .replace(/[;:]/g, ', ')
    .replace(/[()[\]{}]/g, ' ')
    .replace(/["“”«»]/g, '')
    .replace(/(?<!\w)['‘’]|['‘’](?!\w)/g, '')
    .replace(/[*_~`]/g, '')
    .replace(/-/g, ' ');

// Order matters: times and money before bare numbers, numbers before punctuation
const RULES: Rule[] = [
  joinThousands,
  speakTimes,
  speakCurrency,
  speakPercentages,
  speakDecimals,
  speakOrdinals,
  speakYears,
  speakIntegers,
  expandAbbreviations,
  speakSymbols,
  cleanPunctuation,
];

export function normalizeForSpeech(text: string): string {
  return RULES.reduce((result, rule) => rule(result), text)
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.!?])/g, '$1')
    .trim();
}
