declare module 'grapheme-breaker' {
  type GraphemeBreaker = {
    break(str: string): string[]
  };
  const ret: GraphemeBreaker;
  export = ret;
}
