import { HttpServer } from "../http-server";
import { BindingError } from "../errors/startup-error";
import { createMockLogger } from "./helpers";

describe("HttpServer", () => {
  const listener = jest.fn();

  it("should refuse to start more than one process", async () => {
    const server = new HttpServer(listener, createMockLogger());
    server.bind(0, "127.0.0.1");

    await expect(server.start(2)).rejects.toThrow(
      new BindingError("Cannot start 2 processes; only 1 is supported"),
    );
  });

  it("should refuse to start without a bind or a socket", async () => {
    const server = new HttpServer(listener, createMockLogger());

    await expect(server.start()).rejects.toThrow(
      "Nothing to listen on: bind or add a socket first",
    );
  });

  it("should reject process counts before checking the listen target", async () => {
    const server = new HttpServer(listener, createMockLogger());

    await expect(server.start(0)).rejects.toBeInstanceOf(BindingError);
    expect(listener).not.toHaveBeenCalled();
  });
});
