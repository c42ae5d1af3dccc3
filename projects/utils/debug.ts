import fs from 'fs';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;

class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (process.env.DEBUG) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  /**
   * Run the given function and collect every line logged while it runs.
   */
  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
};
type ColorName = keyof typeof ColorCodes;
type ColorFuncs = {
  [Property in ColorName]: (s: string) => string;
};

function colorize(color: ColorName) {
  return (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;
}

export const colors: ColorFuncs = {
  red: colorize('red'),
  green: colorize('green'),
  yellow: colorize('yellow'),
  blue: colorize('blue'),
  reset: colorize('reset'),
  bold: colorize('bold'),
};
