// hangul-romanization ships no type declarations and has no @types package.
declare module 'hangul-romanization' {
  interface HangulRomanization {
    convert(text: string): string;
  }
  const hangulRomanization: HangulRomanization;
  export = hangulRomanization;
}
