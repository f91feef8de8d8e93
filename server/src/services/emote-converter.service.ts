/**
 * Emote Converter Service
 * Decodes one source image and writes every catalog size into its bundle directory
 */
import path from 'path';
import { defaultConcurrency } from '../config/app.config';
import { BundleWriter, bundleDirectoryFor } from './bundle-writer.service';
import {
  CancelledError,
  EmoteError,
  EmoteErrorCode,
  ValidationError,
  describeCauseChain,
} from './errors';
import { ImageDecoderService, SourceImage, extensionOf } from './image-decoder.service';
import { ResizeFillService } from './resize-fill.service';
import { EmoteSize, SizeCatalog } from './size-catalog.service';

export const BASELINE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'gif'];
export const EXTENDED_EXTENSIONS: readonly string[] = [...BASELINE_EXTENSIONS, 'webp'];

export type SelectionResult =
  | { accepted: true; fileName: string; extension: string }
  | { accepted: false; reason: string };

/** States reported after a run starts; before convert() is called a run is idle */
export type ConversionState = 'decoding' | 'converting' | 'done' | 'failed';

export interface ConversionFailure {
  kind: EmoteErrorCode | 'UNKNOWN';
  message: string;
  /** Outermost message first */
  causeChain: string[];
}

export interface ConversionResult {
  readonly bundleDirectory: string;
  /** Catalog order, regardless of completion order */
  readonly writtenFiles: readonly string[];
  readonly error?: ConversionFailure;
}

export interface ConversionProgress {
  completed: number;
  total: number;
  size: EmoteSize;
  file: string;
}

export interface ConversionOptions {
  /** Checked before each catalog entry starts */
  signal?: AbortSignal;
  onStarted?: (inputPath: string) => void;
  onStateChange?: (state: ConversionState) => void;
  onProgress?: (progress: ConversionProgress) => void;
  onSucceeded?: (result: ConversionResult) => void;
  onFailed?: (result: ConversionResult) => void;
}

export interface EmoteConverterOptions {
  catalog?: SizeCatalog;
  concurrency?: number;
  extendedFormats?: boolean;
  decoder?: ImageDecoderService;
  transformer?: ResizeFillService;
  createWriter?: (inputPath: string) => BundleWriter;
}

interface CatalogFailure {
  index: number;
  error: unknown;
}

export class EmoteConverterService {
  readonly catalog: SizeCatalog;
  readonly concurrency: number;
  readonly allowedExtensions: readonly string[];
  private readonly decoder: ImageDecoderService;
  private readonly transformer: ResizeFillService;
  private readonly createWriter: (inputPath: string) => BundleWriter;

  constructor(options: EmoteConverterOptions = {}) {
    this.catalog = options.catalog ?? new SizeCatalog();
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? defaultConcurrency()));
    this.allowedExtensions = options.extendedFormats === false
      ? BASELINE_EXTENSIONS
      : EXTENDED_EXTENSIONS;
    this.decoder = options.decoder ?? new ImageDecoderService();
    this.transformer = options.transformer ?? new ResizeFillService();
    this.createWriter = options.createWriter ?? ((inputPath) => new BundleWriter(inputPath));
  }

  /**
   * Extension-only check; file contents are not inspected
   */
  validateSelection(inputPath: string): SelectionResult {
    const extension = extensionOf(inputPath);

    if (!this.allowedExtensions.includes(extension)) {
      const allowed = this.allowedExtensions.map((ext) => ext.toUpperCase()).join(', ');
      return {
        accepted: false,
        reason: `unsupported file type "${extension ? '.' + extension : path.basename(inputPath)}": please select a ${allowed} file`,
      };
    }

    return { accepted: true, fileName: path.basename(inputPath), extension };
  }

  /**
   * Run one conversion. Never rejects: failures are reported in the result
   * and through exactly one of onSucceeded/onFailed.
   */
  async convert(inputPath: string, options: ConversionOptions = {}): Promise<ConversionResult> {
    const resolvedPath = path.resolve(inputPath);
    const bundleDirectory = bundleDirectoryFor(resolvedPath);
    const setState = (state: ConversionState) => notify(options.onStateChange, state);

    notify(options.onStarted, resolvedPath);
    console.log(`[EmoteConverter] Converting ${resolvedPath}`);

    let writtenFiles: readonly string[] = [];
    try {
      const selection = this.validateSelection(resolvedPath);
      if (!selection.accepted) {
        throw new ValidationError(selection.reason);
      }
      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      setState('decoding');
      // Decode before touching the filesystem so a bad file leaves no directory
      const source = await this.decoder.decodeFile(resolvedPath);
      console.log(`[EmoteConverter] Decoded ${source.width}x${source.height} source`);

      setState('converting');
      const writer = this.createWriter(resolvedPath);
      await writer.ensureDirectory();

      const outcome = await this.convertCatalog(writer, source, options);
      writtenFiles = outcome.written;
      if (outcome.failure) {
        throw outcome.failure.error;
      }
    } catch (error) {
      const result: ConversionResult = {
        bundleDirectory,
        writtenFiles,
        error: toFailure(error),
      };
      console.error(`[EmoteConverter] Conversion failed: ${result.error?.causeChain.join(': ')}`);
      setState('failed');
      notify(options.onFailed, result);
      return result;
    }

    const result: ConversionResult = { bundleDirectory, writtenFiles };
    console.log(`[EmoteConverter] Wrote ${writtenFiles.length} emotes to ${bundleDirectory}`);
    setState('done');
    notify(options.onSucceeded, result);
    return result;
  }

  /**
   * Resize and write every catalog entry with bounded concurrency.
   * No new entry starts once any entry has failed; the lowest failing index wins.
   */
  private async convertCatalog(
    writer: BundleWriter,
    source: SourceImage,
    options: ConversionOptions
  ): Promise<{ written: string[]; failure?: CatalogFailure }> {
    const entries = this.catalog.entries;
    const slots: Array<string | undefined> = new Array(entries.length).fill(undefined);
    const failures: CatalogFailure[] = [];
    let next = 0;
    let completed = 0;

    const runSlot = async (): Promise<void> => {
      while (failures.length === 0 && next < entries.length) {
        const index = next++;
        const size = entries[index];

        if (options.signal?.aborted) {
          failures.push({ index, error: new CancelledError() });
          return;
        }

        try {
          const raster = await this.transformer.resizeFill(source, size.width, size.height);
          const file = await writer.write(size, raster);
          slots[index] = file;
          completed++;
          notify(options.onProgress, { completed, total: entries.length, size, file });
        } catch (error) {
          failures.push({ index, error });
        }
      }
    };

    const workers = Math.min(this.concurrency, entries.length);
    await Promise.all(Array.from({ length: workers }, () => runSlot()));

    const written = slots.filter((file): file is string => file !== undefined);
    if (failures.length === 0) {
      return { written };
    }

    const first = failures.reduce((a, b) => (b.index < a.index ? b : a));
    return { written, failure: first };
  }
}

function toFailure(error: unknown): ConversionFailure {
  return {
    kind: error instanceof EmoteError ? error.code : 'UNKNOWN',
    message: error instanceof Error ? error.message : String(error),
    causeChain: describeCauseChain(error),
  };
}

/**
 * Invoke a caller callback; a throwing listener must not change the run's outcome
 */
function notify<T>(callback: ((value: T) => void) | undefined, value: T): void {
  if (!callback) return;
  try {
    callback(value);
  } catch (error) {
    console.error('[EmoteConverter] Listener threw:', error);
  }
}
