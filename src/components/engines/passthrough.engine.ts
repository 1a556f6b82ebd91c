import { Engine, EngineModule } from "../types";

/** Keeps the source bytes as they are; serves originals. */
export class PassthroughEngine implements Engine {
  private buffer?: Buffer;

  constructor(private readonly onRelease?: (engine: PassthroughEngine) => void) {}

  public load(buffer: Buffer, _extension?: string): void {
    this.buffer = buffer;
  }

  public read(_extension?: string): Buffer {
    if (!this.buffer) {
      throw new Error("Engine has no image loaded");
    }
    return this.buffer;
  }

  public get isLoaded(): boolean {
    return this.buffer !== undefined;
  }

  public release(): void {
    this.buffer = undefined;
    this.onRelease?.(this);
  }
}

/**
 * Engines stay tracked from creation until they are released, so that
 * shutdown can drop whatever in-flight requests still hold.
 */
export class PassthroughEngineModule implements EngineModule {
  private engines = new Set<PassthroughEngine>();

  public create(): PassthroughEngine {
    const engine = new PassthroughEngine((e) => this.engines.delete(e));
    this.engines.add(engine);
    return engine;
  }

  public cleanup(): void {
    for (const engine of Array.from(this.engines)) {
      engine.release();
    }
    this.engines.clear();
  }

  public get liveEngines(): number {
    return this.engines.size;
  }
}
