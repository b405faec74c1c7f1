import { center } from '../text.js';

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line: string) => console.log(line),
  err: (line: string) => console.error(line),
};

const BOX_WIDTH = 70;

export const RULE = '-'.repeat(50);

export function boxHeading(title: string): string[] {
  return [
    `╔${'═'.repeat(BOX_WIDTH)}╗`,
    `║${center(title, BOX_WIDTH)}║`,
    `╚${'═'.repeat(BOX_WIDTH)}╝`,
  ];
}

export function formatBytes(bytes: number): string {
  return `${bytes.toLocaleString('en-US')} bytes (${(bytes / 1024).toFixed(1)} KB)`;
}

export function printLines(output: CliOutput, lines: readonly string[]): void {
  for (const line of lines) {
    output.out(line);
  }
}
