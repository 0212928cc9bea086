/**
 * Shared test fixtures: codelist documents and temp directories.
 */
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { CodeDictionary } from '../code-dictionary.js';

export function codelistXml(entries: Array<[string, string]>, id = 'Test_codelist'): string {
  const definitions = entries
    .map(
      ([code, meaning], i) => `
  <gml:dictionaryEntry>
    <gml:Definition gml:id="id${i + 1}">
      <gml:description>${meaning}</gml:description>
      <gml:name>${code}</gml:name>
    </gml:Definition>
  </gml:dictionaryEntry>`
    )
    .join('');

  return `<?xml version="1.0" encoding="UTF-8"?>
<gml:Dictionary xmlns:gml="http://www.opengis.net/gml" gml:id="${id}">
  <gml:name>${id}</gml:name>${definitions}
</gml:Dictionary>
`;
}

export function dictionary(source: string, entries: Record<string, string>): CodeDictionary {
  return new CodeDictionary(source, Object.entries(entries));
}

export async function makeTempDir(prefix = 'codebook-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(path: string, content: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}
