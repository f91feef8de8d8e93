#!/usr/bin/env node
/**
 * Convert one image into an emote bundle from the command line
 *
 * Usage: emote-bundle <image>
 */
import { loadConfig } from '../config/app.config';
import { EmoteConverterService } from '../services/emote-converter.service';

async function main(argv: string[]): Promise<number> {
  const inputPath = argv[0];
  if (!inputPath) {
    console.error('Usage: emote-bundle <image>');
    return 1;
  }

  const config = loadConfig();
  const converter = new EmoteConverterService({
    concurrency: config.concurrency,
    extendedFormats: config.extendedFormats,
  });

  const selection = converter.validateSelection(inputPath);
  if (!selection.accepted) {
    console.error(`❌ ${selection.reason}`);
    return 1;
  }
  console.log(`📂 Selected: ${selection.fileName}`);

  const result = await converter.convert(inputPath, {
    onProgress: ({ completed, total, size }) => {
      console.log(`   [${completed}/${total}] ${size.platform} ${size.variant} ${size.width}x${size.height}`);
    },
  });

  if (result.error) {
    console.error(`❌ Conversion failed: ${result.error.causeChain.join(': ')}`);
    return 1;
  }

  console.log(`✅ ${result.writtenFiles.length} emotes saved to ${result.bundleDirectory}`);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exitCode = 1;
  }
);
