import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ReadableStream } from "stream/web";
import { createConfig } from "../../config";
import {
  HttpLoader,
  isAllowedSource,
  normalizeSourceUrl,
} from "../loaders/http.loader";
import { FileLoader } from "../loaders/file.loader";
import {
  BadGatewayError,
  BadRequestError,
  ForbiddenError,
  NotFoundError,
} from "../../errors/app-error";
import { createMockLogger } from "../../__tests__/helpers";
import { compileHostPattern } from "../../utils/host-pattern";

const mockLogger = createMockLogger();

describe("http loader", () => {
  describe("normalizeSourceUrl", () => {
    it("should prepend http:// to URLs without a scheme", () => {
      expect(normalizeSourceUrl("mydomain.com/a.png")).toBe(
        "http://mydomain.com/a.png",
      );
    });

    it("should keep an existing scheme", () => {
      expect(normalizeSourceUrl("https://mydomain.com/a.png")).toBe(
        "https://mydomain.com/a.png",
      );
    });

    it("should decode escaped URLs", () => {
      expect(normalizeSourceUrl("mydomain.com%2Fa.png")).toBe(
        "http://mydomain.com/a.png",
      );
    });
  });

  describe("isAllowedSource", () => {
    it("should allow any host when the list is empty", () => {
      expect(isAllowedSource("http://anything.org/a.png", [])).toBe(true);
    });

    it("should match hosts against anchored patterns", () => {
      const allowed = ["mydomain.com", ".+\\.cdn\\.net"].map(compileHostPattern);

      expect(isAllowedSource("http://mydomain.com/a.png", allowed)).toBe(true);
      expect(isAllowedSource("http://img.cdn.net/a.png", allowed)).toBe(true);
      expect(isAllowedSource("http://evil-mydomain.com/a.png", allowed)).toBe(false);
    });

    it("should reject URLs that do not parse", () => {
      expect(isAllowedSource("http://", [compileHostPattern("mydomain.com")])).toBe(
        false,
      );
    });
  });

  describe("HttpLoader.load", () => {
    let fetchSpy: jest.SpyInstance;

    beforeEach(() => {
      jest.clearAllMocks();
      fetchSpy = jest.spyOn(global, "fetch");
    });

    afterEach(() => {
      fetchSpy.mockRestore();
    });

    function makeLoader(settings: Record<string, unknown> = {}): HttpLoader {
      return new HttpLoader(
        createConfig({ ALLOWED_SOURCES: ["mydomain.com"], ...settings }),
        mockLogger,
      );
    }

    it("should return the fetched bytes and content type", async () => {
      fetchSpy.mockResolvedValueOnce(
        new Response(Buffer.from("png-bytes"), {
          status: 200,
          headers: { "content-type": "image/png" },
        }),
      );

      const result = await makeLoader().load("mydomain.com/a.png");

      expect(fetchSpy).toHaveBeenCalledWith(
        "http://mydomain.com/a.png",
        expect.objectContaining({ signal: expect.any(AbortSignal) }),
      );
      expect(result.buffer).toEqual(Buffer.from("png-bytes"));
      expect(result.contentType).toBe("image/png");
    });

    it("should refuse hosts outside ALLOWED_SOURCES without fetching", async () => {
      await expect(makeLoader().load("other.com/a.png")).rejects.toThrow(
        ForbiddenError,
      );
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it("should throw NotFoundError when the source answers 404", async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 404 }));

      await expect(makeLoader().load("mydomain.com/a.png")).rejects.toThrow(
        NotFoundError,
      );
    });

    it("should throw BadGatewayError for other failing statuses", async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 500 }));

      await expect(makeLoader().load("mydomain.com/a.png")).rejects.toThrow(
        'Source "http://mydomain.com/a.png" answered with status 500',
      );
    });

    it("should throw BadGatewayError when the fetch itself fails", async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(makeLoader().load("mydomain.com/a.png")).rejects.toThrow(
        BadGatewayError,
      );
      expect(mockLogger.warn).toHaveBeenCalledWith(
        "Fetching http://mydomain.com/a.png failed",
        { error: "fetch failed" },
      );
    });

    it("should reject sources over MAX_SOURCE_SIZE", async () => {
      fetchSpy.mockResolvedValueOnce(
        new Response(Buffer.from("12345678"), { status: 200 }),
      );

      await expect(
        makeLoader({ MAX_SOURCE_SIZE: 4 }).load("mydomain.com/a.png"),
      ).rejects.toThrow(BadRequestError);
    });

    it("should refuse a declared length over MAX_SOURCE_SIZE without reading the body", async () => {
      const pull = jest.fn();
      const cancel = jest.fn();
      const body = new ReadableStream<Uint8Array>(
        { pull, cancel },
        { highWaterMark: 0 },
      );
      fetchSpy.mockResolvedValueOnce(
        new Response(body, {
          status: 200,
          headers: { "content-length": "100" },
        }),
      );

      await expect(
        makeLoader({ MAX_SOURCE_SIZE: 10 }).load("mydomain.com/a.png"),
      ).rejects.toThrow("Source image is 100 bytes, over the 10 byte limit");
      expect(pull).not.toHaveBeenCalled();
      expect(cancel).toHaveBeenCalled();
    });

    it("should stop reading once the body grows past MAX_SOURCE_SIZE", async () => {
      const cancel = jest.fn();
      const body = new ReadableStream<Uint8Array>(
        {
          // never ends on its own
          pull: (controller) => controller.enqueue(new Uint8Array(4)),
          cancel,
        },
        { highWaterMark: 0 },
      );
      fetchSpy.mockResolvedValueOnce(new Response(body, { status: 200 }));

      await expect(
        makeLoader({ MAX_SOURCE_SIZE: 10 }).load("mydomain.com/a.png"),
      ).rejects.toThrow("Source image is over the 10 byte limit");
      expect(cancel).toHaveBeenCalled();
    });

    it("should accept a body of exactly MAX_SOURCE_SIZE bytes", async () => {
      fetchSpy.mockResolvedValueOnce(
        new Response(Buffer.from("1234"), {
          status: 200,
          headers: { "content-length": "4" },
        }),
      );

      const result = await makeLoader({ MAX_SOURCE_SIZE: 4 }).load(
        "mydomain.com/a.png",
      );

      expect(result.buffer).toEqual(Buffer.from("1234"));
    });
  });
});

describe("FileLoader", () => {
  let root: string;
  let loader: FileLoader;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "imagery-files-"));
    fs.mkdirSync(path.join(root, "nested"));
    fs.writeFileSync(path.join(root, "nested", "photo.png"), "png-bytes");
    loader = new FileLoader(
      createConfig({ FILE_LOADER_ROOT_PATH: root }),
      mockLogger,
    );
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should read files below the root path", async () => {
    const result = await loader.load("nested/photo.png");

    expect(result.buffer.toString()).toBe("png-bytes");
  });

  it("should ignore leading slashes", async () => {
    const result = await loader.load("/nested/photo.png");

    expect(result.buffer.toString()).toBe("png-bytes");
  });

  it("should throw NotFoundError for a missing file", async () => {
    await expect(loader.load("nested/missing.png")).rejects.toThrow(
      'Source "nested/missing.png" not found',
    );
  });

  it("should throw NotFoundError for a directory", async () => {
    await expect(loader.load("nested")).rejects.toThrow(NotFoundError);
  });

  it("should refuse paths escaping the root", async () => {
    await expect(loader.load("../etc/passwd")).rejects.toThrow(ForbiddenError);
    await expect(loader.load("..%2Fetc%2Fpasswd")).rejects.toThrow(
      ForbiddenError,
    );
  });

  it("should reject files over MAX_SOURCE_SIZE", async () => {
    const small = new FileLoader(
      createConfig({ FILE_LOADER_ROOT_PATH: root, MAX_SOURCE_SIZE: 4 }),
      mockLogger,
    );

    await expect(small.load("nested/photo.png")).rejects.toThrow(BadRequestError);
  });
});
