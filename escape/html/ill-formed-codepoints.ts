import { CharacterCodes, isSurrogate } from '../scanner/character-codes.js';

// Windows-1252 characters for numeric references in 0x80..0x9F.
// Zero keeps the value as it is.
const windows1252 = [
  0x20AC, 0, 0x201A, 0x0192, 0x201E, 0x2026, 0x2020, 0x2021,
  0x02C6, 0x2030, 0x0160, 0x2039, 0x0152, 0, 0x017D, 0,
  0, 0x2018, 0x2019, 0x201C, 0x201D, 0x2022, 0x2013, 0x2014,
  0x02DC, 0x2122, 0x0161, 0x203A, 0x0153, 0, 0x017E, 0x0178,
];

/**
 * Codepoint a browser shows for a numeric reference to `value`.
 */
export function translateIllFormedCodepoint(value: number): number {
  if (value === CharacterCodes.nullCharacter) return CharacterCodes.replacementCharacter;
  if (value >= 0x80 && value <= CharacterCodes.c1ControlEnd)
    return windows1252[value - 0x80] || value;
  if (isSurrogate(value) || value > CharacterCodes.maxCodepoint)
    return CharacterCodes.replacementCharacter;
  return value;
}
