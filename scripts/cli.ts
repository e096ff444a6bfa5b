#!/usr/bin/env npx tsx
/**
 * CLI for generating an exclusion zone ring and writing its .txt and .gpx files.
 *
 * Usage:
 *   npx tsx scripts/cli.ts
 *   npx tsx scripts/cli.ts --lat 78.9243 --lon 11.9233 --radius 900
 *   npx tsx scripts/cli.ts --dms-lat 78,56,34.68 --dms-lon 11,51,19.78 --check
 *   npx tsx scripts/cli.ts --radius 5000 --points 180 --out ./zones --json
 */

import { ExclusionZoneBuilder, InvalidInputError, DmsCoordinateSchema, dmsPairToPoint } from '../src';
import type { DmsAngle, GeoPoint } from '../src';

/** Default center: 78°56'34.68"N 11°51'19.78"E */
const DEFAULT_CENTER_DMS = {
  latitude: { degrees: 78, minutes: 56, seconds: 34.68 },
  longitude: { degrees: 11, minutes: 51, seconds: 19.78 },
};

interface CliOptions {
  lat?: number;
  lon?: number;
  dmsLat?: DmsAngle;
  dmsLon?: DmsAngle;
  radius: number;
  points?: number;
  name?: string;
  out?: string;
  author?: string;
  email?: string;
  check: boolean;
  json: boolean;
}

// Parse command line arguments
function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const result: CliOptions = {
    radius: 900,
    check: false,
    json: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1] ?? '';

    switch (arg) {
      case '--lat':
        result.lat = parseFloat(next);
        i++;
        break;
      case '--lon':
      case '--lng':
        result.lon = parseFloat(next);
        i++;
        break;
      case '--dms-lat':
        result.dmsLat = parseDms(next);
        i++;
        break;
      case '--dms-lon':
        result.dmsLon = parseDms(next);
        i++;
        break;
      case '--radius':
      case '-r':
        result.radius = parseFloat(next);
        i++;
        break;
      case '--points':
      case '-n':
        result.points = Number(next);
        i++;
        break;
      case '--name':
        result.name = next;
        i++;
        break;
      case '--out':
      case '-o':
        result.out = next;
        i++;
        break;
      case '--author':
        result.author = next;
        i++;
        break;
      case '--email':
        result.email = next;
        i++;
        break;
      case '--check':
      case '-c':
        result.check = true;
        break;
      case '--json':
      case '-j':
        result.json = true;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return result;
}

/**
 * Parse "deg,min,sec" (e.g. "78,56,34.68" or "-11,51,19.78").
 */
function parseDms(value: string): DmsAngle {
  const [degrees, minutes = 0, seconds = 0] = value.split(',').map((part) => Number(part.trim()));
  return { degrees, minutes, seconds };
}

function resolveCenter(opts: CliOptions): GeoPoint {
  if (opts.lat !== undefined || opts.lon !== undefined) {
    if (opts.lat === undefined || opts.lon === undefined) {
      throw InvalidInputError.forField('center', '--lat and --lon must be given together');
    }
    return { latitude: opts.lat, longitude: opts.lon };
  }

  const parseResult = DmsCoordinateSchema.safeParse({
    latitude: opts.dmsLat ?? DEFAULT_CENTER_DMS.latitude,
    longitude: opts.dmsLon ?? DEFAULT_CENTER_DMS.longitude,
  });
  if (!parseResult.success) {
    throw InvalidInputError.fromZodError(parseResult.error);
  }

  return dmsPairToPoint(parseResult.data);
}

function printHelp() {
  console.log(`
Exclusion Zone Ring CLI

Usage:
  npx tsx scripts/cli.ts [options]

Options:
  --lat <number>       Center latitude in decimal degrees
  --lon <number>       Center longitude in decimal degrees
  --dms-lat <d,m,s>    Center latitude as degrees,minutes,seconds (default: 78,56,34.68)
  --dms-lon <d,m,s>    Center longitude as degrees,minutes,seconds (default: 11,51,19.78)
  --radius <meters>    Circle radius in meters (default: 900)
  --points <number>    Bearing steps around the circle (default: 90)
  --name <string>      Output base name (default: derived from radius and center)
  --out <dir>          Output directory (default: current directory)
  --author <string>    GPX author name
  --email <address>    GPX author contact address (default: zones@example.org)
  --check              Recompute every point's distance from the center
  --json               Output the result as JSON
  --help               Show this help

Examples:
  # Default 900 m zone
  npx tsx scripts/cli.ts

  # 5 km zone at one point per 2 degrees, with distance check
  npx tsx scripts/cli.ts --lat 78.9243 --lon 11.9233 --radius 5000 --points 180 --check
`);
}

function main() {
  const opts = parseArgs();
  const center = resolveCenter(opts);

  const builder = new ExclusionZoneBuilder({
    outputDir: opts.out,
    numPoints: opts.points,
    verify: opts.check,
    track: { author: opts.author, email: opts.email },
  });

  const result = builder.build({ center, radiusMeters: opts.radius, name: opts.name });

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log('='.repeat(60));
  console.log('Exclusion Zone Ring');
  console.log('='.repeat(60));
  console.log(`Center: ${center.latitude}, ${center.longitude}`);
  console.log(`Radius: ${opts.radius}m`);
  console.log(`Points: ${result.ring.length}`);
  console.log('-'.repeat(60));

  for (const output of result.outputs) {
    console.log(`  ✓ ${output.path} (${output.bytesWritten} bytes)`);
  }

  if (result.verification) {
    console.log();
    console.log('Distance check:');
    result.verification.distances.forEach((distance, i) => {
      console.log(`  ${String(i).padStart(3)}: ${distance.toFixed(4)}m`);
    });
    console.log(`  Max deviation: ${(result.verification.maxDeviationMeters * 1000).toFixed(1)}mm`);
  }
}

try {
  main();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Error:', message);
  if (err instanceof InvalidInputError) {
    console.error(err.getFormattedIssues());
  }
  process.exit(1);
}
