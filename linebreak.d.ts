declare module 'linebreak' {
  type LineBreakBreakT = {position: number, required: boolean};

  class LineBreak {
    constructor(str: string);
    nextBreak(): LineBreakBreakT | null;
  }

  namespace LineBreak {
    type LineBreakBreak = LineBreakBreakT;
  }

  export = LineBreak;
}
