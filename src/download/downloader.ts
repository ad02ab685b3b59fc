/**
 * Streaming file downloader with checksum verification and retry
 * - Skips destinations that already exist (no network request)
 * - Streams to <destination>.tmp in 1 MiB chunks, hashing the same bytes
 * - Renames onto the destination only after the checksum matches
 * - Retries every failure with linear backoff up to maxRetries
 */

import { createHash, getHashes, type Hash } from 'crypto';
import { mkdir, open, rename, rm, stat, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import type { StreamingTransport } from '../graph/transport.js';
import { ChecksumMismatchError, DownloadError, describeError, hasErrorCode } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getTempPath } from '../utils/paths.js';
import { retry, RetryError } from '../utils/retry.js';

export const CHUNK_SIZE = 1024 * 1024;
export const DEFAULT_IDLE_TIMEOUT_MS = 120_000;
export const DEFAULT_BACKOFF_MS = 5_000;
export const DEFAULT_MAX_RETRIES = 3;

export interface DownloadRequest {
  url: string;
  destinationPath: string;
  expectedChecksum?: string | null;
  /** Node crypto algorithm name; default "sha256" */
  checksumAlgorithm?: string;
  maxRetries?: number;
}

export interface DownloadOptions {
  /** Base of the linear backoff: attempt n waits backoffMs * n */
  backoffMs?: number;
  /** Abort an attempt when no bytes arrive for this long */
  idleTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DownloadResult {
  destinationPath: string;
  /** false when the destination already existed */
  downloaded: boolean;
  /** Attempts made; 0 when skipped */
  attempts: number;
  sizeBytes: number;
  /** Hex digest of the written bytes, when a checksum was verified */
  checksum?: string;
}

async function existingSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

export function isSupportedAlgorithm(algorithm: string): boolean {
  return getHashes().includes(algorithm.toLowerCase());
}

/**
 * Buffers incoming pieces and writes them to the handle in CHUNK_SIZE blocks
 */
class ChunkWriter {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  written = 0;

  constructor(
    private readonly handle: FileHandle,
    private readonly hash: Hash | null
  ) {}

  async push(piece: Buffer): Promise<void> {
    this.hash?.update(piece);
    this.pending.push(piece);
    this.pendingBytes += piece.length;
    if (this.pendingBytes >= CHUNK_SIZE) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.pendingBytes === 0) {
      return;
    }
    const block = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    await this.handle.write(block);
    this.written += block.length;
  }
}

interface AttemptInput {
  transport: StreamingTransport;
  url: string;
  destinationPath: string;
  tempPath: string;
  expectedChecksum: string | null;
  algorithm: string;
  idleTimeoutMs: number;
}

/**
 * One attempt: open, stream to the temp file, verify, rename
 */
async function streamToDisk(input: AttemptInput): Promise<{ sizeBytes: number; checksum?: string }> {
  const { transport, url, destinationPath, tempPath, expectedChecksum, algorithm, idleTimeoutMs } = input;

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const armIdleTimer = () => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(
      () => controller.abort(new Error(`No data received for ${idleTimeoutMs}ms`)),
      idleTimeoutMs
    );
    timer.unref();
  };

  try {
    armIdleTimer();
    const response = await transport.openStream(url, { signal: controller.signal });

    await mkdir(dirname(destinationPath), { recursive: true });

    const hash = expectedChecksum ? createHash(algorithm) : null;
    const handle = await open(tempPath, 'w');
    let sizeBytes: number;
    try {
      const writer = new ChunkWriter(handle, hash);
      if (response.body) {
        const reader = response.body.getReader();
        try {
          for (;;) {
            const { done, value } = await reader.read();
            if (done) break;
            armIdleTimer();
            await writer.push(Buffer.from(value));
          }
        } catch (error) {
          // Release the connection before the next attempt opens another
          await reader.cancel(error).catch((cancelError: unknown) => {
            getLogger().debug(`Could not cancel response body: ${describeError(cancelError)}`);
          });
          throw error;
        }
      }
      await writer.flush();
      sizeBytes = writer.written;
    } finally {
      await handle.close();
    }

    let digest: string | undefined;
    if (hash && expectedChecksum) {
      digest = hash.digest('hex');
      if (digest.toLowerCase() !== expectedChecksum.toLowerCase()) {
        throw new ChecksumMismatchError(destinationPath, expectedChecksum, digest);
      }
    }

    await rename(tempPath, destinationPath);
    return { sizeBytes, checksum: digest };
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Download one file to destinationPath
 * @throws DownloadError when the retry budget is spent
 */
export async function downloadFile(
  transport: StreamingTransport,
  request: DownloadRequest,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const logger = getLogger();
  const { url, destinationPath } = request;
  const expectedChecksum = request.expectedChecksum ?? null;
  const algorithm = (request.checksumAlgorithm ?? 'sha256').toLowerCase();
  const maxRetries = request.maxRetries ?? DEFAULT_MAX_RETRIES;

  const size = await existingSize(destinationPath);
  if (size !== null) {
    logger.debug(`Skipping download (already exists): ${destinationPath}`);
    return { destinationPath, downloaded: false, attempts: 0, sizeBytes: size };
  }

  if (expectedChecksum && !isSupportedAlgorithm(algorithm)) {
    throw DownloadError.fromUnsupportedAlgorithm(url, algorithm);
  }

  const tempPath = getTempPath(destinationPath);
  logger.info(`Downloading ${url}`);

  try {
    const { value, attempts } = await retry(
      () =>
        streamToDisk({
          transport,
          url,
          destinationPath,
          tempPath,
          expectedChecksum,
          algorithm,
          idleTimeoutMs: options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS,
        }),
      {
        maxRetries,
        backoffMs: options.backoffMs ?? DEFAULT_BACKOFF_MS,
        sleep: options.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.warn(
            `Download error (${error.message}). Retrying in ${delayMs}ms (attempt ${attempt}/${maxRetries})`
          );
        },
      }
    );

    logger.debug(`Saved ${destinationPath} (${value.sizeBytes} bytes)`);
    return {
      destinationPath,
      downloaded: true,
      attempts,
      sizeBytes: value.sizeBytes,
      checksum: value.checksum,
    };
  } catch (error) {
    await rm(tempPath, { force: true });
    if (error instanceof RetryError) {
      logger.error(`Failed to download ${url} after ${error.attempts} attempts`);
      throw DownloadError.fromExhaustedRetries(url, error.attempts, error.lastError);
    }
    throw new DownloadError(url, `Failed to download ${url}: ${describeError(error)}`, 0, { cause: error });
  }
}
