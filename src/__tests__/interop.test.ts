/**
 * RustSec <-> CSAF conversion tests
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parseOrThrow, serialize } from '../codec/index.js';
import {
  fromMinimalAdvisory,
  InteropError,
  toMinimalAdvisory,
  toMinimalAdvisoryOrThrow,
  type MinimalAdvisory,
} from '../interop/index.js';
import { ConfigError, type CsafkitConfig } from '../config/index.js';
import type { Csaf, Publisher } from '../model/index.js';
import { NAME, VERSION } from '../version.js';

const publisher: Publisher = { category: 'other', name: 'Test Publisher', namespace: 'https://example.com' };
const config: CsafkitConfig = { interop: { publisher } };

const advisory: MinimalAdvisory = {
  id: 'RUSTSEC-2021-0001',
  package: 'example-crate',
  title: 'Example',
  date: '2021-01-01',
  versions: { patched: ['>=1.2.3'], unaffected: [] },
};

const detailed: MinimalAdvisory = {
  id: 'RUSTSEC-2023-0100',
  package: 'widget-parser',
  title: 'Stack overflow on nested input',
  description: 'Deeply nested documents exhaust the stack.',
  date: '2023-06-15',
  aliases: ['CVE-2023-12345', 'GHSA-abcd-efgh-ijkl'],
  related: ['RUSTSEC-2023-0099'],
  references: ['https://example.com/issues/7'],
  url: 'https://example.com/advisories/RUSTSEC-2023-0100',
  cvss: 'CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H',
  keywords: ['stack-overflow', 'parsing'],
  versions: { patched: ['>=0.9.1'], unaffected: ['<0.5.0'] },
};

function interopError(run: () => unknown): InteropError {
  try {
    run();
  } catch (err) {
    if (err instanceof InteropError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected an InteropError');
}

function reverseError(csaf: Csaf): InteropError {
  const result = toMinimalAdvisory(csaf);
  if (result.ok) {
    throw new Error('expected conversion to fail');
  }
  return result.error;
}

// ============================================================
// RustSec -> CSAF
// ============================================================

describe('fromMinimalAdvisory', () => {
  it('synthesizes the document scaffolding', () => {
    const csaf = fromMinimalAdvisory(advisory, config);

    expect(csaf.document.category).toBe('csaf_security_advisory');
    expect(csaf.document.csaf_version).toBe('2.0');
    expect(csaf.document.title).toBe('Example');
    expect(csaf.document.publisher).toEqual(publisher);
    expect(csaf.document.publisher).not.toBe(publisher);
    expect(csaf.document.lang).toBeUndefined();
    expect(csaf.document.tracking).toEqual({
      current_release_date: '2021-01-01T00:00:00.000Z',
      generator: { engine: { name: NAME, version: VERSION } },
      id: 'RUSTSEC-2021-0001',
      initial_release_date: '2021-01-01T00:00:00.000Z',
      revision_history: [{ date: '2021-01-01T00:00:00.000Z', number: '1', summary: 'Initial version.' }],
      status: 'final',
      version: '1',
    });
  });

  it('builds one product per package and range', () => {
    const csaf = fromMinimalAdvisory(advisory, config);

    expect(csaf.product_tree).toEqual({
      branches: [
        {
          branches: [
            {
              category: 'product_version_range',
              name: '>=1.2.3',
              product: { name: 'example-crate >=1.2.3', product_id: 'example-crate@>=1.2.3' },
            },
          ],
          category: 'product_name',
          name: 'example-crate',
          product: { name: 'example-crate', product_id: 'example-crate' },
        },
      ],
    });
  });

  it('produces exactly one vulnerability with a vendor fix', () => {
    const csaf = fromMinimalAdvisory(advisory, config);

    expect(csaf.vulnerabilities).toEqual([
      {
        product_status: {
          known_affected: ['example-crate'],
          fixed: ['example-crate@>=1.2.3'],
        },
        remediations: [
          {
            category: 'vendor_fix',
            details: 'Upgrade example-crate to a version matching >=1.2.3',
            product_ids: ['example-crate'],
          },
        ],
        title: 'Example',
      },
    ]);
  });

  it('leaves fields without a source absent', () => {
    const csaf = fromMinimalAdvisory({ ...advisory, versions: { patched: [], unaffected: [] } }, config);
    const [vuln] = csaf.vulnerabilities ?? [];

    expect(vuln.remediations).toBeUndefined();
    expect(vuln.scores).toBeUndefined();
    expect(vuln.cve).toBeUndefined();
    expect(vuln.notes).toBeUndefined();
    expect(vuln.product_status).toEqual({ known_affected: ['example-crate'] });
    expect(csaf.product_tree?.branches?.[0].branches).toBeUndefined();
    expect(csaf.document.references).toBeUndefined();
    expect(csaf.document.tracking.aliases).toBeUndefined();
  });

  it('maps aliases, notes, references and score', () => {
    const csaf = fromMinimalAdvisory(detailed, { interop: { publisher, lang: 'en' } });
    const [vuln] = csaf.vulnerabilities ?? [];

    expect(csaf.document.lang).toBe('en');
    expect(csaf.document.references).toEqual([
      { category: 'self', summary: 'Canonical advisory URL', url: 'https://example.com/advisories/RUSTSEC-2023-0100' },
    ]);
    expect(csaf.document.tracking.aliases).toEqual(['RUSTSEC-2023-0099']);
    expect(vuln.cve).toBe('CVE-2023-12345');
    expect(vuln.ids).toEqual([
      { system_name: 'CVE', text: 'CVE-2023-12345' },
      { system_name: 'GHSA', text: 'GHSA-abcd-efgh-ijkl' },
    ]);
    expect(vuln.notes).toEqual([
      { category: 'description', text: 'Deeply nested documents exhaust the stack.', title: 'Description' },
      { category: 'other', text: 'stack-overflow', title: 'Keyword' },
      { category: 'other', text: 'parsing', title: 'Keyword' },
    ]);
    expect(vuln.references).toEqual([
      { category: 'external', summary: 'https://example.com/issues/7', url: 'https://example.com/issues/7' },
    ]);
    expect(vuln.product_status).toEqual({
      known_affected: ['widget-parser'],
      fixed: ['widget-parser@>=0.9.1'],
      known_not_affected: ['widget-parser@<0.5.0'],
    });
    expect(vuln.scores?.[0].products).toEqual(['widget-parser']);
    expect(vuln.scores?.[0].cvss_v3?.baseScore).toBe(7.5);
    expect(vuln.scores?.[0].cvss_v3?.baseSeverity).toBe('HIGH');
  });

  it('marks withdrawn advisories', () => {
    const csaf = fromMinimalAdvisory({ ...advisory, withdrawn: '2021-03-01' }, config);

    expect(csaf.document.tracking.status).toBe('withdrawn');
    expect(csaf.document.tracking.current_release_date).toBe('2021-03-01T00:00:00.000Z');
    expect(csaf.document.tracking.initial_release_date).toBe('2021-01-01T00:00:00.000Z');
  });

  it('collapses repeated ranges into one product', () => {
    const csaf = fromMinimalAdvisory({ ...advisory, versions: { patched: ['>=1.2.3', '>=1.2.3'], unaffected: [] } }, config);

    expect(csaf.product_tree?.branches?.[0].branches).toHaveLength(1);
    expect(csaf.vulnerabilities?.[0].product_status?.fixed).toEqual(['example-crate@>=1.2.3']);
  });

  it('rejects an invalid date', () => {
    const error = interopError(() => fromMinimalAdvisory({ ...advisory, date: '2021-02-30' }, config));

    expect(error.detail).toEqual({ kind: 'invalid_field', name: 'date', reason: 'not a date: "2021-02-30"' });
    expect(error.message).toBe(`Invalid 'date': not a date: "2021-02-30"`);
  });

  it('requires a configured publisher', () => {
    const error = interopError(() => fromMinimalAdvisory(advisory));

    expect(error.detail).toEqual({ kind: 'invalid_field', name: 'interop.publisher', reason: 'no publisher configured' });
  });

  it('rejects an invalid interop configuration', () => {
    const invalid = { interop: { publisher: { ...publisher, namespace: 'not a url' } } };

    expect(() => fromMinimalAdvisory(advisory, invalid)).toThrow(ConfigError);
    expect(() => fromMinimalAdvisory(advisory, invalid)).toThrow(
      'Invalid configuration: interop.publisher.namespace is not a URL: not a url'
    );
  });

  it('rejects an invalid CVSS vector', () => {
    const error = interopError(() => fromMinimalAdvisory({ ...advisory, cvss: 'CVSS:3.1/AV:N' }, config));

    expect(error.kind).toBe('invalid_field');
    expect(error.detail).toMatchObject({ name: 'cvss' });
  });

  it('serializes to a document that parses strictly', () => {
    const csaf = fromMinimalAdvisory(detailed, config);
    const reparsed = parseOrThrow(serialize(csaf), { strict: true });

    expect(reparsed).toEqual(csaf);
  });
});

// ============================================================
// CSAF -> RustSec
// ============================================================

describe('toMinimalAdvisory', () => {
  it('recovers identifier, title and date', () => {
    const result = toMinimalAdvisory(fromMinimalAdvisory(advisory, config));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.id).toBe('RUSTSEC-2021-0001');
    expect(result.value.title).toBe('Example');
    expect(result.value.date).toBe('2021-01-01');
    expect(result.value).toEqual(advisory);
  });

  it('recovers every minimal field through serialization', () => {
    const text = serialize(fromMinimalAdvisory(detailed, config));
    expect(toMinimalAdvisoryOrThrow(parseOrThrow(text))).toEqual(detailed);
  });

  it('keeps alias order when a non-CVE alias comes first', () => {
    const input: MinimalAdvisory = { ...advisory, aliases: ['GHSA-aaaa-bbbb-cccc', 'CVE-2021-1234'] };
    const csaf = fromMinimalAdvisory(input, config);

    expect(csaf.vulnerabilities?.[0].cve).toBe('CVE-2021-1234');
    expect(toMinimalAdvisoryOrThrow(parseOrThrow(serialize(csaf))).aliases).toEqual([
      'GHSA-aaaa-bbbb-cccc',
      'CVE-2021-1234',
    ]);
  });

  it('keeps keywords that contain a comma', () => {
    const input: MinimalAdvisory = { ...advisory, keywords: ['memory, safety', 'dos'] };
    const back = toMinimalAdvisoryOrThrow(parseOrThrow(serialize(fromMinimalAdvisory(input, config))));

    expect(back.keywords).toEqual(['memory, safety', 'dos']);
    expect(back).toEqual(input);
  });

  it('puts a CVE missing from the ids first', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    const [vuln] = csaf.vulnerabilities ?? [];
    const back = toMinimalAdvisoryOrThrow({
      ...csaf,
      vulnerabilities: [{ ...vuln, cve: 'CVE-2021-0001', ids: [{ system_name: 'GHSA', text: 'GHSA-aaaa-bbbb-cccc' }] }],
    });

    expect(back.aliases).toEqual(['CVE-2021-0001', 'GHSA-aaaa-bbbb-cccc']);
  });

  it('recovers the withdrawal date', () => {
    const back = toMinimalAdvisoryOrThrow(fromMinimalAdvisory({ ...advisory, withdrawn: '2021-03-01' }, config));
    expect(back.withdrawn).toBe('2021-03-01');
  });

  it('rejects two vulnerabilities', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    const vuln = csaf.vulnerabilities?.[0] ?? {};
    const error = reverseError({ ...csaf, vulnerabilities: [vuln, { ...vuln, cve: 'CVE-2021-0002' }] });

    expect(error).toBeInstanceOf(InteropError);
    expect(error.detail).toEqual({ kind: 'multiple_vulnerabilities', count: 2 });
    expect(error.message).toBe('Expected exactly one vulnerability, found 2');
  });

  it('rejects a document without vulnerabilities', () => {
    const { vulnerabilities: _vulnerabilities, ...csaf } = fromMinimalAdvisory(advisory, config);
    expect(reverseError(csaf).detail).toEqual({ kind: 'missing_required_field', name: 'vulnerabilities' });
  });

  it('rejects a blank tracking id', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    csaf.document.tracking.id = '  ';

    const error = reverseError(csaf);
    expect(error.detail).toEqual({ kind: 'missing_required_field', name: 'id' });
    expect(error.message).toBe("Cannot recover required field 'id'");
  });

  it('rejects a blank title', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    csaf.document.title = '';
    expect(reverseError(csaf).detail).toEqual({ kind: 'missing_required_field', name: 'title' });
  });

  it('rejects a document without products', () => {
    const { product_tree: _tree, ...csaf } = fromMinimalAdvisory(advisory, config);
    expect(reverseError(csaf).detail).toEqual({ kind: 'missing_required_field', name: 'package' });
  });

  it('falls back to the first full product name', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    csaf.product_tree = { full_product_names: [{ name: 'libfoo', product_id: 'FOO' }] };

    const back = toMinimalAdvisoryOrThrow(csaf);
    expect(back.package).toBe('libfoo');
    expect(back.versions).toEqual({ patched: [], unaffected: [] });
  });

  it('throws from the throwing variant', () => {
    const csaf = fromMinimalAdvisory(advisory, config);
    expect(() => toMinimalAdvisoryOrThrow({ ...csaf, vulnerabilities: [] })).toThrow(InteropError);
  });
});

// ============================================================
// Projection, not inverse
// ============================================================

describe('lossy projection', () => {
  const original = parseOrThrow(
    readFileSync(fileURLToPath(new URL('./fixtures/vendor-advisory.json', import.meta.url)), 'utf-8')
  );

  it('extracts the minimal fields from a vendor document', () => {
    expect(toMinimalAdvisoryOrThrow(original)).toEqual({
      id: 'EX-2023-0042',
      package: 'Widget Server',
      title: 'Denial of service in Widget Server',
      description: 'The request parser allocates without bound.',
      date: '2023-02-01',
      aliases: ['CVE-2023-99999', 'BUG-1234'],
      related: ['EXSA-42'],
      references: ['https://example.com/issues/1234'],
      url: 'https://example.com/advisories/EX-2023-0042.json',
      cvss: 'CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H',
      versions: { patched: [], unaffected: [] },
    });
  });

  it('does not rebuild the original document', () => {
    const rebuilt = fromMinimalAdvisory(toMinimalAdvisoryOrThrow(original), config);

    expect(rebuilt).not.toEqual(original);
    expect(rebuilt.document.publisher).toEqual(publisher);
    expect(rebuilt.product_tree).not.toEqual(original.product_tree);
    expect(rebuilt.vulnerabilities?.[0].remediations).toBeUndefined();
    expect(rebuilt.document.tracking.id).toBe(original.document.tracking.id);
  });
});
