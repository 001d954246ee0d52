import axios from 'axios';
import { randomUUID } from 'crypto';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';

const storageLogger = logger.child({ module: 'photo-storage' });

/**
 * Where report and cleanup photos live. The lifecycle only keeps the URL
 * returned by `upload`.
 */
export interface PhotoStorage {
  upload(content: Buffer, filename: string, folder: string): Promise<string>;
  remove(url: string): Promise<void>;
}

export const PHOTO_FOLDERS = {
  reports: 'reports',
  cleanups: 'cleanups',
} as const;

const uploadResponseSchema = z.object({ url: z.string().url() });

const storedName = (filename: string): string => {
  const extension = extname(filename).toLowerCase();
  return `${randomUUID()}${extension}`;
};

/**
 * Remote media service reached over HTTP.
 */
export class HttpPhotoStorage implements PhotoStorage {
  private readonly headers: Record<string, string>;

  constructor(
    private readonly baseURL: string,
    apiToken?: string
  ) {
    this.headers = {
      'Content-Type': 'application/json',
      ...(apiToken ? { Authorization: `Bearer ${apiToken}` } : {}),
    };
  }

  async upload(content: Buffer, filename: string, folder: string): Promise<string> {
    try {
      const response = await axios.post(
        `${this.baseURL}/upload`,
        {
          folder,
          filename: storedName(filename),
          content_base64: content.toString('base64'),
        },
        { headers: this.headers, timeout: 15000 }
      );
      return uploadResponseSchema.parse(response.data).url;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        storageLogger.error({ status: error.response.status, folder }, 'Photo upload rejected by storage service');
      } else if (axios.isAxiosError(error) && error.request) {
        storageLogger.error({ folder }, 'No response from storage service');
      }
      throw error;
    }
  }

  async remove(url: string): Promise<void> {
    await axios.delete(`${this.baseURL}/files`, {
      headers: this.headers,
      params: { url },
      timeout: 15000,
    });
  }
}

/**
 * Local directory served by the API under /static.
 */
export class DiskPhotoStorage implements PhotoStorage {
  constructor(
    private readonly uploadDir: string,
    private readonly publicBaseUrl: string
  ) {}

  private get urlPrefix(): string {
    return `${this.publicBaseUrl.replace(/\/$/, '')}/static/`;
  }

  async upload(content: Buffer, filename: string, folder: string): Promise<string> {
    const directory = join(this.uploadDir, folder);
    await mkdir(directory, { recursive: true });

    const name = storedName(filename);
    await writeFile(join(directory, name), content);
    return `${this.urlPrefix}${folder}/${name}`;
  }

  async remove(url: string): Promise<void> {
    if (!url.startsWith(this.urlPrefix)) {
      storageLogger.warn({ url }, 'Photo URL is not managed by local storage');
      return;
    }
    const [folder, name] = url.slice(this.urlPrefix.length).split('/');
    if (!folder || !name) return;
    await unlink(join(this.uploadDir, basename(folder), basename(name)));
  }
}
