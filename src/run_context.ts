export type RunContext = {
  out: (line: string) => void;
  warn: (line: string) => void;
  debug: boolean;
  errors: number;
};

export function createRunContext(init: Partial<RunContext> = {}): RunContext {
  return {
    out: init.out ?? ((line) => console.log(line)),
    warn: init.warn ?? ((line) => console.error(line)),
    debug: init.debug ?? false,
    errors: init.errors ?? 0,
  };
}

export function softError(ctx: RunContext, msg: string): void {
  ctx.errors += 1;
  ctx.warn(msg);
}

export function exitStatus(ctx: RunContext): number {
  return ctx.errors > 0 ? 1 : 0;
}
