import { describe, expect, it, vi } from 'vitest';
import {
  buildTradePartnerRows,
  groupTradeProfiles,
} from '../../modules/eiu/services/aggregate-trade-partners.js';
import { mappingFrom } from '../tabular/country-bridge.js';
import { createReferenceData, type MappingLoader, upsertCountryMappings } from './reference-data.js';

describe('createReferenceData', () => {
  it('loads each kind once and trims keys and values', async () => {
    const load = vi.fn<MappingLoader>(async (kind) =>
      kind === 'customs-name-to-iso' ? [{ sourceKey: ' 독일 ', targetValue: 'DE ' }] : []
    );
    const reference = createReferenceData(load);

    const first = await reference.lookup('customs-name-to-iso');
    const again = await reference.lookup('customs-name-to-iso');
    const other = await reference.lookup('iso-to-target-name');

    expect(first.get('독일')).toBe('DE');
    expect(again).toBe(first);
    expect(other.size).toBe(0);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('matches partner names regardless of the case they were loaded in', async () => {
    const reference = createReferenceData(async (kind) =>
      kind === 'partner-name-to-iso' ? [{ sourceKey: 'Germany', targetValue: 'DE' }] : []
    );
    const partnerToCode = await reference.lookup('partner-name-to-iso');

    expect(partnerToCode.get('germany')).toBe('DE');
    expect(partnerToCode.has('Germany')).toBe(false);

    const rows = buildTradePartnerRows(
      groupTradeProfiles([
        { countryName: 'Korea', countryCode: 'KR', partner: 'Germany', rate: 100, direction: 'export' },
      ]),
      { partnerToCode, codeToName: mappingFrom([['DE', '독일']]) }
    );
    expect(rows[0]?.exportPartner).toBe('독일');
  });

  it('leaves keys of other kinds in their loaded case', async () => {
    const reference = createReferenceData(async () => [{ sourceKey: 'Korea', targetValue: 'KR' }]);
    expect((await reference.lookup('english-name-to-iso')).get('Korea')).toBe('KR');
  });

  it('does not share a cache between instances', async () => {
    const load = vi.fn<MappingLoader>(async () => []);
    await createReferenceData(load).lookup('english-name-to-iso');
    await createReferenceData(load).lookup('english-name-to-iso');
    expect(load).toHaveBeenCalledTimes(2);
  });
});

describe('upsertCountryMappings', () => {
  it('writes nothing for an empty batch', async () => {
    await expect(upsertCountryMappings([])).resolves.toBe(0);
  });
});
