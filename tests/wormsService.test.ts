/**
 * WoRMS source adapter tests
 */

import { parseMatchNamesResponse, selectWormsCandidate, WoRMSTaxon, createWormsSource } from '../src/services/taxonomy/wormsService';
import { FAST_RETRY, HOMO_SAPIENS, fakeHttp, httpError, lineageQuery, noSleep, wormsName } from './helpers';

const HOMO_SAPIENS_RECORD: WoRMSTaxon = {
  AphiaID: 100001,
  scientificname: 'Homo sapiens',
  status: 'accepted',
  rank: 'Species',
  match_type: 'exact',
  kingdom: 'Animalia',
  phylum: 'Chordata',
  class: 'Mammalia',
  order: 'Primates',
  family: 'Hominidae',
  genus: 'Homo',
};

const HOMO_RECORD: WoRMSTaxon = {
  AphiaID: 100002,
  scientificname: 'Homo',
  status: 'accepted',
  rank: 'Genus',
  match_type: 'exact',
  kingdom: 'Animalia',
  phylum: 'Chordata',
  class: 'Mammalia',
  order: 'Primates',
  family: 'Hominidae',
  genus: 'Homo',
};

function wormsTable(table: Record<string, WoRMSTaxon[]>) {
  return fakeHttp((_path, params) => {
    const candidates = table[wormsName(params)];
    // WoRMS answers 204 with an empty body when nothing matches
    return candidates ? [candidates] : '';
  });
}

function source(http: ReturnType<typeof fakeHttp>['client']) {
  return createWormsSource({ retry: FAST_RETRY, timeoutMs: 1000, http, hooks: { sleep: noSleep } });
}

describe('WoRMS source adapter', () => {
  it('resolves a species to its AphiaID LSID', async () => {
    const { client, get } = wormsTable({ 'Homo sapiens': [HOMO_SAPIENS_RECORD] });

    const result = await source(client).resolve(lineageQuery(HOMO_SAPIENS));

    expect(result).toMatchObject({
      matchedRank: 'species',
      matchedName: 'Homo sapiens',
      identifier: 'urn:lsid:marinespecies.org:taxname:100001',
      matchType: 'exact',
      source: 'worms',
      queriedName: 'Homo sapiens',
    });
    expect(result.classification).toEqual({
      kingdom: 'Animalia',
      phylum: 'Chordata',
      class: 'Mammalia',
      order: 'Primates',
      family: 'Hominidae',
      genus: 'Homo',
      species: 'Homo sapiens',
    });
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith('/AphiaRecordsByMatchNames', {
      scientificnames: ['Homo sapiens'],
      marine_only: 'false',
    });
  });

  it('queries the genus first for species-excluded assays', async () => {
    const { client, get } = wormsTable({
      'Homo sapiens': [HOMO_SAPIENS_RECORD],
      Homo: [HOMO_RECORD],
    });

    const result = await source(client).resolve(lineageQuery(HOMO_SAPIENS, '16S', ['16S']));

    expect(result.matchedRank).toBe('genus');
    expect(result.matchedName).toBe('Homo');
    expect(get).toHaveBeenCalledTimes(1);
    expect(wormsName(get.mock.calls[0][1])).toBe('Homo');
  });

  it('falls back to the next coarser rank', async () => {
    const { client, get } = wormsTable({
      Thunnus: [{ AphiaID: 100010, scientificname: 'Thunnus', status: 'accepted', rank: 'Genus', match_type: 'exact' }],
    });

    const result = await source(client).resolve(
      lineageQuery('Animalia;Chordata;Actinopteri;Scombriformes;Scombridae;Thunnus;Thunnus_imaginarius')
    );

    expect(result.matchedRank).toBe('genus');
    expect(result.queriedName).toBe('Thunnus');
    expect(result.identifier).toBe('urn:lsid:marinespecies.org:taxname:100010');
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('reports no-candidate after walking every rank', async () => {
    const { client, get } = wormsTable({});

    const result = await source(client).resolve(lineageQuery(HOMO_SAPIENS));

    expect(result.matchType).toBe('no-match');
    expect(result.identifier).toBeNull();
    expect(result.failure).toEqual({ cause: 'no-candidate', message: 'No worms match at any of 7 rank(s)' });
    expect(get).toHaveBeenCalledTimes(7);
  });

  it('gives up on a key after repeated throttling', async () => {
    const { client, get } = fakeHttp(() => {
      throw httpError(503);
    });

    const result = await source(client).resolve(lineageQuery(HOMO_SAPIENS));

    expect(result.matchType).toBe('no-match');
    expect(result.failure?.cause).toBe('transient');
    expect(get).toHaveBeenCalledTimes(FAST_RETRY.maxAttempts);
  });

  it('does not retry a rejected request', async () => {
    const { client, get } = fakeHttp(() => {
      throw httpError(400);
    });

    const result = await source(client).resolve(lineageQuery(HOMO_SAPIENS));

    expect(result.failure?.cause).toBe('permanent');
    expect(get).toHaveBeenCalledTimes(1);
  });
});

describe('selectWormsCandidate', () => {
  const query = lineageQuery('Animalia;Chordata;Actinopteri;Perciformes;Percidae;Oldgenus');
  const entry = query.entries[query.entries.length - 1];

  it('follows an unaccepted name to its valid taxon', () => {
    const match = selectWormsCandidate(
      [{
        AphiaID: 200,
        scientificname: 'Oldgenus',
        status: 'unaccepted',
        valid_AphiaID: 201,
        valid_name: 'Newgenus',
        rank: 'Genus',
        match_type: 'exact',
      }],
      entry,
      query
    );

    expect(match).toEqual({
      rank: 'genus',
      name: 'Newgenus',
      identifier: 'urn:lsid:marinespecies.org:taxname:201',
      matchType: 'accepted-synonym',
      classification: {},
    });
  });

  it('prefers an accepted record over an earlier unaccepted one', () => {
    const match = selectWormsCandidate(
      [
        { AphiaID: 300, scientificname: 'Oldgenus', status: 'unaccepted', rank: 'Genus', match_type: 'exact' },
        { AphiaID: 301, scientificname: 'Oldgenus', status: 'accepted', rank: 'Genus', match_type: 'exact' },
      ],
      entry,
      query
    );

    expect(match?.identifier).toBe('urn:lsid:marinespecies.org:taxname:301');
    expect(match?.matchType).toBe('exact');
  });

  it('prefers a homonym at the queried rank', () => {
    const match = selectWormsCandidate(
      [
        { AphiaID: 400, scientificname: 'Oldgenus', status: 'accepted', rank: 'Subgenus', match_type: 'exact' },
        { AphiaID: 401, scientificname: 'Oldgenus', status: 'accepted', rank: 'Genus', match_type: 'exact' },
      ],
      entry,
      query
    );

    expect(match?.identifier).toBe('urn:lsid:marinespecies.org:taxname:401');
  });

  it('maps near matches to fuzzy and drops genus-only matches', () => {
    const fuzzy = selectWormsCandidate(
      [{ AphiaID: 500, scientificname: 'Oldgenu', status: 'accepted', rank: 'Genus', match_type: 'near_1' }],
      entry,
      query
    );
    const genusOnly = selectWormsCandidate(
      [{ AphiaID: 501, scientificname: 'Oldgenus', status: 'accepted', rank: 'Genus', match_type: 'exact_genus' }],
      entry,
      query
    );

    expect(fuzzy?.matchType).toBe('fuzzy');
    expect(genusOnly).toBeNull();
  });

  it('refuses species records for species-excluded queries', () => {
    const excluded = lineageQuery('Animalia;Chordata;Mammalia;Primates;Hominidae;Homo', '16S', ['16S']);
    const genus = excluded.entries[excluded.entries.length - 1];

    expect(selectWormsCandidate([HOMO_SAPIENS_RECORD], genus, excluded)).toBeNull();
  });
});

describe('parseMatchNamesResponse', () => {
  it('reads the first candidate list and skips malformed records', () => {
    expect(parseMatchNamesResponse([[HOMO_RECORD, { AphiaID: 'x' }]])).toEqual([HOMO_RECORD]);
    expect(parseMatchNamesResponse('')).toEqual([]);
    expect(parseMatchNamesResponse([null])).toEqual([]);
  });
});
