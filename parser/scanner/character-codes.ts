/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  // Control characters
  backspace = 0x08,
  tab = 0x09,
  lineFeed = 0x0A,              // \n
  verticalTab = 0x0B,
  formFeed = 0x0C,
  carriageReturn = 0x0D,        // \r
  shiftOut = 0x0E,
  unitSeparator = 0x1F,
  delete = 0x7F,

  // ASCII printable characters
  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  singleQuote = 0x27,           // '
  minus = 0x2D,                 // -
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >

  A = 0x41,
  Z = 0x5A,

  backtick = 0x60,              // `

  a = 0x61,
  z = 0x7A,
}

/**
 * Check if character is HTML whitespace: space, LF, CR, TAB or form feed
 */
export function isHtmlWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.formFeed;
}

/**
 * Check if character is a C0 control or DEL, excluding the whitespace set
 */
export function isControlCharacter(ch: number): boolean {
  return (ch >= CharacterCodes.nullCharacter && ch <= CharacterCodes.backspace) ||
         ch === CharacterCodes.verticalTab ||
         (ch >= CharacterCodes.shiftOut && ch <= CharacterCodes.unitSeparator) ||
         ch === CharacterCodes.delete;
}

/**
 * Check if character is an ASCII letter
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

/**
 * Check if character is an alphanumeric character
 */
export function isAlphaNumeric(ch: number): boolean {
  return isLetter(ch) || isDigit(ch);
}

/**
 * Attribute names run until whitespace, a control character, a quote, '>', '/' or '='
 */
export function isAttributeNameTerminator(ch: number): boolean {
  return isHtmlWhiteSpace(ch) ||
         isControlCharacter(ch) ||
         ch === CharacterCodes.doubleQuote ||
         ch === CharacterCodes.singleQuote ||
         ch === CharacterCodes.greaterThan ||
         ch === CharacterCodes.slash ||
         ch === CharacterCodes.equals;
}

/**
 * Unquoted attribute values run until whitespace, a control character, a quote, '=', '>', '<' or '`'
 */
export function isUnquotedValueTerminator(ch: number): boolean {
  return isHtmlWhiteSpace(ch) ||
         isControlCharacter(ch) ||
         ch === CharacterCodes.doubleQuote ||
         ch === CharacterCodes.singleQuote ||
         ch === CharacterCodes.equals ||
         ch === CharacterCodes.greaterThan ||
         ch === CharacterCodes.lessThan ||
         ch === CharacterCodes.backtick;
}

function toAsciiLower(ch: number): number {
  return ch >= CharacterCodes.A && ch <= CharacterCodes.Z ? ch + 0x20 : ch;
}

/**
 * Lowercase A-Z only; every other character is left as it is
 */
export function toAsciiLowerCase(text: string): string {
  return text.replace(/[A-Z]/g, letter => letter.toLowerCase());
}

/**
 * Compare two strings folding only ASCII letters; other characters must match exactly
 */
export function equalsIgnoreAsciiCase(left: string, right: string): boolean {
  if (left.length !== right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (toAsciiLower(left.charCodeAt(i)) !== toAsciiLower(right.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

/**
 * Render a character for error messages.
 * `undefined` stands for the end of the document.
 */
export function describeCharacter(ch: number | undefined): string {
  if (ch === undefined) return '[document end]';
  if (isControlCharacter(ch)) {
    return '[control character 0x' + ch.toString(16).padStart(2, '0') + ']';
  }
  return String.fromCodePoint(ch);
}
