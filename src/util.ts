let _id = 0;
export function id(): string {
  return String(_id++);
}

export function loggableText(text: string): string {
  return text.replace(/\n/g, '⏎').replace(/\t/g, '␉');
}

/**
 * Thrown when the engine finds itself in a state that only a bug in the engine
 * could produce. Never used for bad input.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class Logger {
  string: string;
  indent: string[];
  lineIsEmpty: boolean;

  constructor() {
    this.string = '';
    this.indent = [];
    this.lineIsEmpty = false;
  }

  underline() {
    this.string += '\x1b[4m';
  }

  dim() {
    this.string += '\x1b[2m';
  }

  reset() {
    this.string += '\x1b[0m';
  }

  flush() {
    console.log(this.string);
    this.string = '';
  }

  text(str: string | number) {
    const lines = String(str).split('\n');

    const append = (s: string) => {
      if (s) {
        if (this.lineIsEmpty) this.string += this.indent.join('');
        this.string += s;
        this.lineIsEmpty = false;
      }
    };

    for (let i = 0; i < lines.length; i++) {
      if (i === 0) {
        append(lines[i]);
      } else {
        this.string += '\n';
        this.lineIsEmpty = true;
        append(lines[i]);
      }
    }
  }

  pushIndent(indent = '  ') {
    this.indent.push(indent);
  }

  popIndent() {
    this.indent.pop();
  }
}

export class Deferred<T> {
  status: 'unresolved' | 'resolved' | 'rejected';
  promise: Promise<T>;
  resolve!: (v: T) => void;
  reject!: (e?: unknown) => void;

  constructor() {
    this.status = 'unresolved';
    this.promise = new Promise((resolve, reject) => {
      this.resolve = (t: T) => {
        if (this.status === 'unresolved') {
          this.status = 'resolved';
          resolve(t);
        }
      };

      this.reject = (e: unknown) => {
        if (this.status === 'unresolved') {
          this.status = 'rejected';
          reject(e);
        }
      };
    });
  }
}
