/**
 * Magic-byte signatures of the image types the service answers with.
 * Each entry maps a MIME type to one or more valid leading-byte sequences.
 */
const MAGIC_BYTES: Record<string, Buffer[]> = {
  "image/jpeg": [Buffer.from([0xff, 0xd8, 0xff])],
  "image/png": [Buffer.from([0x89, 0x50, 0x4e, 0x47])],
  "image/gif": [Buffer.from("GIF87a"), Buffer.from("GIF89a")],
  "image/webp": [Buffer.from("RIFF")],
  "image/tiff": [Buffer.from([0x49, 0x49, 0x2a, 0x00]), Buffer.from([0x4d, 0x4d, 0x00, 0x2a])],
};

export function detectMimeType(data: Buffer): string | null {
  for (const [mimeType, signatures] of Object.entries(MAGIC_BYTES)) {
    const matches = signatures.some((sig) => {
      if (data.length < sig.length) return false;
      return data.subarray(0, sig.length).equals(sig);
    });
    if (!matches) continue;

    // RIFF is shared with WAV/AVI; WebP carries its tag at offset 8
    if (mimeType === "image/webp" && data.subarray(8, 12).toString("ascii") !== "WEBP") {
      continue;
    }
    return mimeType;
  }
  return null;
}

export function getSupportedTypes(): string[] {
  return Object.keys(MAGIC_BYTES);
}
