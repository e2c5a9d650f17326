import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_DATA_DIR = join(__dirname, '..', 'data');

const labelMapSchema = z.record(z.string());
const optionListSchema = z.array(z.object({ value: z.string(), label: z.string() }));

/**
 * Read-only lookup tables shipped with the library. Build one with
 * `loadCatalog()` at startup and hand it to every device.
 */
export interface Catalog {
  readonly ledEffects: ReadonlyMap<string, string>;
  readonly errorMessages: ReadonlyMap<number, string>;
  /** Autoplay values in display order. */
  readonly autoplayOptions: ReadonlyArray<{ value: string; label: string }>;
}

function readJson(dataDir: string, file: string): unknown {
  return JSON.parse(readFileSync(join(dataDir, file), 'utf8'));
}

export function loadCatalog(dataDir: string = DEFAULT_DATA_DIR): Catalog {
  const ledEffects = labelMapSchema.parse(readJson(dataDir, 'led-effects.json'));
  const errorCodes = labelMapSchema.parse(readJson(dataDir, 'error-codes.json'));
  const autoplay = optionListSchema.parse(readJson(dataDir, 'autoplay-options.json'));

  return Object.freeze({
    ledEffects: new Map(Object.entries(ledEffects)),
    errorMessages: new Map(
      Object.entries(errorCodes).map(([code, message]): [number, string] => [Number(code), message])
    ),
    autoplayOptions: Object.freeze(autoplay.map((option) => Object.freeze({ ...option }))),
  });
}
