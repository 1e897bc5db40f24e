import type { InterpreterContext } from '../InterpreterContext.js';

/** Use case: release the line source. Calling it again is a no-op. */
export class CloseInterpreter {
  constructor(private readonly ctx: InterpreterContext) {}

  execute(): void {
    if (this.ctx.closed) return;

    this.ctx.closed = true;
    this.ctx.source.close();
    this.ctx.eventBus.emit({ type: 'interpreter:closed', timestamp: Date.now() });
  }
}
