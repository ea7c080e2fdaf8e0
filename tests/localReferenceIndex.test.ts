/**
 * Local reference index tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { LocalReferenceError } from '../src/services/taxonomy/errors';
import { LocalReferenceIndex, loadLocalReferenceIndex } from '../src/services/taxonomy/localReferenceIndex';
import { lineageQuery } from './helpers';

const TUNA = 'Animalia;Chordata;Actinopteri;Scombriformes;Scombridae;Thunnus;Thunnus_albacares';

const REFERENCE_ROWS = [
  { scientificName: 'Thunnus albacares', aphiaId: 100020, taxonRank: 'Species', acceptedName: null },
  { scientificName: 'thunnus  ALBACARES', aphiaId: 999999, taxonRank: 'Species', acceptedName: null },
  { scientificName: 'Oldgenus', aphiaId: 'urn:lsid:marinespecies.org:taxname:100021', taxonRank: 'Genus', acceptedName: 'Newgenus' },
  { scientificName: 'No identifier', aphiaId: null, taxonRank: 'Genus', acceptedName: null },
];

describe('LocalReferenceIndex', () => {
  const index = LocalReferenceIndex.fromRows(REFERENCE_ROWS);

  it('keeps the first row for each name and skips rows without an identifier', () => {
    expect(index.size).toBe(2);
  });

  it('matches the finest name exactly', () => {
    const query = lineageQuery(TUNA);

    expect(index.lookup(query)).toEqual({
      key: query.key,
      matchedRank: 'species',
      matchedName: 'Thunnus albacares',
      identifier: 'urn:lsid:marinespecies.org:taxname:100020',
      matchType: 'exact',
      source: 'local',
      queriedName: 'Thunnus albacares',
      classification: {
        kingdom: 'Animalia',
        phylum: 'Chordata',
        class: 'Actinopteri',
        order: 'Scombriformes',
        family: 'Scombridae',
        genus: 'Thunnus',
        species: 'Thunnus albacares',
      },
    });
  });

  it('takes higher ranks from the sheet before the lineage', () => {
    const withRanks = LocalReferenceIndex.fromRows([
      {
        scientificName: 'Thunnus albacares',
        aphiaId: 127027,
        taxonRank: 'Species',
        kingdom: 'Animalia',
        phylum: null,
        class: 'Teleostei',
        order: 'Scombriformes',
        family: null,
        genus: null,
        species: null,
      },
    ]);

    const result = withRanks.lookup(lineageQuery('Animalia;Chordata;Actinopteri;;Scombridae;Thunnus;Thunnus_albacares'));

    expect(result?.classification).toEqual({
      kingdom: 'Animalia',
      phylum: 'Chordata',
      class: 'Teleostei',
      order: 'Scombriformes',
      family: 'Scombridae',
      genus: 'Thunnus',
      species: 'Thunnus albacares',
    });
  });

  it('reports the accepted name and keeps existing LSIDs', () => {
    const result = index.lookup(lineageQuery('Animalia;Chordata;Actinopteri;Perciformes;Percidae;Oldgenus'));

    expect(result?.matchedName).toBe('Newgenus');
    expect(result?.identifier).toBe('urn:lsid:marinespecies.org:taxname:100021');
    expect(result?.matchedRank).toBe('genus');
  });

  it('does not match coarser levels', () => {
    expect(index.lookup(lineageQuery('Animalia;Chordata;Actinopteri;Scombriformes;Scombridae;Thunnus'))).toBeUndefined();
  });

  it('refuses a species record for a species-excluded query', () => {
    const excluded = lineageQuery('Animalia;Chordata;Actinopteri;Scombriformes;Scombridae;Thunnus albacares', '16S', ['16S']);

    expect(excluded.speciesExcluded).toBe(true);
    expect(index.lookup(excluded)).toBeUndefined();
  });

  it('requires name and identifier columns', () => {
    expect(() => LocalReferenceIndex.fromRows([{ scientificName: 'Thunnus', rank: 'Genus' }], 'taxa.xlsx')).toThrow(
      LocalReferenceError
    );
  });
});

describe('loadLocalReferenceIndex', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'local-reference-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeWorkbook(fileName: string, rows: object[]): string {
    const filePath = path.join(tempDir, fileName);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), 'taxa');
    XLSX.writeFile(workbook, filePath);
    return filePath;
  }

  it('builds the index from a spreadsheet', () => {
    const filePath = writeWorkbook('reference.xlsx', [
      { AphiaID: 100020, scientificname: 'Thunnus albacares', rank: 'Species' },
      { AphiaID: 100030, scientificname: 'Scombridae', rank: 'Family' },
    ]);

    const loaded = loadLocalReferenceIndex(filePath);

    expect(loaded.size).toBe(2);
    expect(loaded.lookup(lineageQuery(TUNA))?.identifier).toBe('urn:lsid:marinespecies.org:taxname:100020');
  });

  it('fails when the file is missing', () => {
    const missing = path.join(tempDir, 'missing.xlsx');

    expect(() => loadLocalReferenceIndex(missing)).toThrow(`Local reference database not found: ${missing}`);
  });

  it('fails when the named sheet does not exist', () => {
    const filePath = writeWorkbook('other.xlsx', [{ AphiaID: 1, scientificname: 'Gadus' }]);

    expect(() => loadLocalReferenceIndex(filePath, 'pr2')).toThrow(
      `Local reference database unreadable (${filePath}): sheet "pr2" not found`
    );
  });
});
