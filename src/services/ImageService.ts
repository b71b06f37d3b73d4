import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";

/**
 * Image upload configuration constants
 */
export const IMAGE_CONSTRAINTS = {
  MAX_FILE_SIZE: 10 * 1024 * 1024, // 10MB
  MAX_FILENAME_LENGTH: 100,
} as const;

export const IMAGES_URL_PREFIX = "/images";

export interface StoredImage {
  /** Name relative to the images directory; persisted on the listing */
  path: string;
  size: number;
}

export interface ImageStore {
  save(originalName: string, data: Buffer): Promise<StoredImage>;
}

/**
 * Strips directory parts and anything outside [A-Za-z0-9._-] from an
 * uploaded file name.
 */
export function sanitizeFilename(originalName: string): string {
  const base = path.basename(originalName.replace(/\\/g, "/"));
  const cleaned = base
    .replace(/[^A-Za-z0-9._-]/g, "_")
    .replace(/^\.+/, "")
    .slice(-IMAGE_CONSTRAINTS.MAX_FILENAME_LENGTH);
  return cleaned || "image";
}

export function imageUrl(imagePath: string): string {
  return `${IMAGES_URL_PREFIX}/${encodeURIComponent(imagePath)}`;
}

/**
 * Writes uploads to a local directory served statically at /images.
 * Names are prefixed with a UUID so uploads never overwrite each other.
 */
export class LocalImageStore implements ImageStore {
  constructor(private readonly directory: string) {}

  async save(originalName: string, data: Buffer): Promise<StoredImage> {
    const fileName = `${uuidv4()}_${sanitizeFilename(originalName)}`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(path.join(this.directory, fileName), data);

    logger.info(`🖼️ Stored image ${fileName}`, { size: data.length });
    return { path: fileName, size: data.length };
  }
}
