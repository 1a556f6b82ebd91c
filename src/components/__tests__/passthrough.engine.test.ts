import { PassthroughEngineModule } from "../engines/passthrough.engine";

describe("PassthroughEngineModule", () => {
  let module: PassthroughEngineModule;

  beforeEach(() => {
    module = new PassthroughEngineModule();
  });

  it("should return the loaded bytes unchanged", () => {
    const engine = module.create();
    const source = Buffer.from("image-bytes");

    engine.load(source, ".png");

    expect(engine.read(".png")).toBe(source);
  });

  it("should throw when reading before loading", () => {
    expect(() => module.create().read()).toThrow("Engine has no image loaded");
  });

  it("should stop tracking an engine once it is released", () => {
    const engine = module.create();
    module.create();

    engine.release();

    expect(module.liveEngines).toBe(1);
  });

  it("should release every live engine on cleanup", () => {
    const first = module.create();
    const second = module.create();
    first.load(Buffer.from("a"));
    second.load(Buffer.from("b"));

    module.cleanup();

    expect(first.isLoaded).toBe(false);
    expect(second.isLoaded).toBe(false);
    expect(module.liveEngines).toBe(0);
  });
});
