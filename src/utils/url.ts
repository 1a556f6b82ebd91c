import { BadRequestError } from "../errors/app-error";

export function decodeSourcePath(url: string): string {
  try {
    return decodeURIComponent(url);
  } catch {
    throw new BadRequestError(`Malformed source URL "${url}"`);
  }
}
