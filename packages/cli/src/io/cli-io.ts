export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  /** Directory that relative manifest, parts and output paths resolve against. */
  cwd(): string;
  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
}
