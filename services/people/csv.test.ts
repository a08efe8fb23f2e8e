import { describe, it, expect } from 'vitest';
import { escapeCsvField, peopleToCsv, personRow } from './csv';

const HEADER =
  'full_name,section,role,primary_affiliation,country,pins,score_total,contact_labels,trial_ncts';

describe('peopleToCsv', () => {
  it('renders the pivot with quoting and CRLF rows', () => {
    const csv = peopleToCsv([
      {
        full_name: 'Ana Ruiz',
        section: 'Care & Management',
        role: 'PI, Neurology',
        affiliations: [
          { name: 'General Hospital', country: 'US', type: 'Secondary' },
          { name: 'Uni "North"', country: 'CA', type: 'Primary' },
        ],
        pins: ['seizures', 'EEG'],
        score_breakdown: { total: 87.5 },
        contacts: [{ label: 'Email' }, { label: 'Lab page' }],
        trials: [{ nct_id: 'NCT01234567' }, { nct_id: 'NCT07654321' }],
      },
      { full_name: 'Bo Li' },
    ]);

    expect(csv).toBe(
      `${HEADER}\r\n` +
        'Ana Ruiz,Care & Management,"PI, Neurology","Uni ""North""",CA,seizures;EEG,87.5,Email;Lab page,NCT01234567;NCT07654321\r\n' +
        'Bo Li,,,,,,,,\r\n',
    );
  });

  it('renders only the header for a missing people list', () => {
    expect(peopleToCsv(undefined)).toBe(`${HEADER}\r\n`);
  });
});

describe('personRow', () => {
  it('falls back to the first affiliation when none is primary', () => {
    const row = personRow({ full_name: 'C', affiliations: [{ name: 'A', country: 'DE' }] });
    expect(row.slice(3, 5)).toEqual(['A', 'DE']);
  });
});

describe('escapeCsvField', () => {
  it('quotes only when needed', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });
});
