import { existsSync } from 'fs';
import { resolve } from 'path';
import * as fontkit from 'fontkit';
import { FontFile } from '../src/fonts/font-file.js';
import { createFontkitSources } from '../src/fonts/fontkit-source.js';
import { resolveStyleRequest } from '../src/fonts/font-style.js';
import type { StyleRequest } from '../src/types/fonts.js';

function parseArgs(argv: string[]): {
  files: string[];
  expand: boolean;
  request?: StyleRequest;
  json: boolean;
} {
  const out: { files: string[]; expand: boolean; request?: StyleRequest; json: boolean } = {
    files: [],
    expand: true,
    json: false
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a === '--no-expand') out.expand = false;
    else if (a === '--json') out.json = true;
    else if (a === '--weight') out.request = { ...out.request, weight: argv[++i] };
    else if (a === '--style') out.request = { ...out.request, style: argv[++i] };
    else if (a === '--stretch') out.request = { ...out.request, stretch: argv[++i] };
    else out.files.push(a);
  }

  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.files.length === 0) {
    console.error('Usage: describe-font <font file>... [--no-expand] [--json] [--weight w] [--style s] [--stretch s]');
    process.exit(2);
  }

  for (const file of args.files) {
    const filePath = resolve(file);
    if (!existsSync(filePath)) {
      throw new Error(`Font file not found: ${filePath}`);
    }

    const fontFile = new FontFile(createFontkitSources(fontkit.openSync(filePath)), {
      expandNamedInstances: args.expand
    });
    const families = fontFile.getFamilies();

    if (args.json) {
      const summary = families.map((family) => ({
        familyName: family.familyName,
        typefaces: family.typefaces.map((typeface) => ({
          fullName: typeface.fullName,
          styleName: typeface.styleName,
          weight: typeface.weight,
          width: typeface.width,
          slope: typeface.slope,
          coordinates: typeface.variationCoordinates,
          palettes: typeface.predefinedPalettes?.length ?? 0
        }))
      }));
      console.log(JSON.stringify({ file: filePath, families: summary }, null, 2));
    } else {
      console.log(`${filePath}: ${fontFile.faceCount} face(s), ${families.length} family(ies)`);
      for (const family of families) {
        console.log(`  ${family.familyName}`);
        for (const typeface of family.typefaces) {
          console.log(`    ${typeface.fullName} [${typeface.width}, ${typeface.weight}, ${typeface.slope}]`);
        }
      }
    }

    if (args.request) {
      const { width, weight, slope } = resolveStyleRequest(args.request);
      for (const family of families) {
        const match = family.getTypefaceByStyle(width, weight, slope);
        console.log(`  best match in ${family.familyName} for ${width}/${weight}/${slope}: ${match.fullName}`);
      }
    }
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
