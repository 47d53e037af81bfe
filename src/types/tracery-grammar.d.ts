declare module 'tracery-grammar' {
  type Modifier = (s: string, params?: string[]) => string;

  interface Grammar {
    flatten(rule: string): string;
    addModifiers(mods: Record<string, Modifier>): void;
  }

  interface Tracery {
    createGrammar(raw: Record<string, string | string[]>): Grammar;
    baseEngModifiers: Record<string, Modifier>;
    setRng?: (rng: () => number) => void;
  }

  const tracery: Tracery;
  export default tracery;
}
