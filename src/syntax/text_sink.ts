/**
 * 调试序列化器的输出目标。
 */
export interface TextSink {
  write(text: string): void;
  writeLine(): void;
}

export class StringSink implements TextSink {
  private readonly parts: string[] = [];

  constructor(private readonly newLine = '\n') {}

  write(text: string): void {
    this.parts.push(text);
  }

  writeLine(): void {
    this.parts.push(this.newLine);
  }

  toString(): string {
    return this.parts.join('');
  }
}
