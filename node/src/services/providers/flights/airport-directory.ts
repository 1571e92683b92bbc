// Read-only city → airport codes mapping, loaded once at startup.
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '@/types/errors';
import type { AirportCode, CityName } from '@/types/flights';

const airportCodeSchema = z.string().trim().min(1, 'airport code must be a non-empty string').toUpperCase();

const cityMappingSchema = z.record(
  // Keys stay raw here; fromJson trims them so two spellings of one city are caught.
  z.string().refine((city) => city.trim().length > 0, 'city name must be a non-empty string'),
  z.union([airportCodeSchema, z.array(airportCodeSchema).min(1, 'city needs at least one airport code')]),
);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// The data file is either the mapping itself or the mapping wrapped under "cities_airports".
const airportFileSchema = z.preprocess(
  (value) => (isPlainObject(value) && isPlainObject(value.cities_airports) ? value.cities_airports : value),
  cityMappingSchema,
);

const EMPTY: ReadonlySet<AirportCode> = new Set();

export class AirportDirectory {
  private readonly entries: ReadonlyMap<CityName, ReadonlySet<AirportCode>>;

  private constructor(entries: Map<CityName, ReadonlySet<AirportCode>>) {
    this.entries = entries;
  }

  /**
   * Builds a directory from an already parsed JSON value.
   * @throws ConfigError when the value is not a city → code(s) mapping
   */
  static fromJson(data: unknown, source = 'airport data'): AirportDirectory {
    const parsed = airportFileSchema.safeParse(data);
    if (!parsed.success) {
      const details = parsed.error.errors
        .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
        .join('; ');
      throw new ConfigError(`Invalid ${source}: ${details}`);
    }

    const entries = new Map<CityName, ReadonlySet<AirportCode>>();
    for (const [city, codes] of Object.entries(parsed.data)) {
      const name = city.trim();
      if (entries.has(name)) {
        throw new ConfigError(`Invalid ${source}: city "${name}" is listed more than once`);
      }
      entries.set(name, new Set(typeof codes === 'string' ? [codes] : codes));
    }
    return new AirportDirectory(entries);
  }

  /**
   * Reads and validates the airport data file.
   * @throws ConfigError when the file is missing, unparsable or malformed
   */
  static load(filePath: string): AirportDirectory {
    const resolved = path.resolve(process.cwd(), filePath);

    let text: string;
    try {
      text = fs.readFileSync(resolved, 'utf8');
    } catch (err) {
      throw new ConfigError(`Cannot read airport data file ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`Airport data file ${resolved} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    return AirportDirectory.fromJson(data, `airport data file ${resolved}`);
  }

  /** Airport codes for a city; the empty set when the city is unknown. */
  lookup(city: CityName): ReadonlySet<AirportCode> {
    return this.entries.get(city.trim()) ?? EMPTY;
  }

  /** City names in file order. */
  cities(): CityName[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
