/**
 * csafkit - Interop errors
 */

export type InteropErrorDetail =
  | { kind: 'multiple_vulnerabilities'; count: number }
  | { kind: 'missing_required_field'; name: string }
  | { kind: 'invalid_field'; name: string; reason: string };

function describe(detail: InteropErrorDetail): string {
  switch (detail.kind) {
    case 'multiple_vulnerabilities':
      return `Expected exactly one vulnerability, found ${detail.count}`;
    case 'missing_required_field':
      return `Cannot recover required field '${detail.name}'`;
    case 'invalid_field':
      return `Invalid '${detail.name}': ${detail.reason}`;
  }
}

export class InteropError extends Error {
  readonly detail: InteropErrorDetail;

  constructor(detail: InteropErrorDetail) {
    super(describe(detail));
    this.name = 'InteropError';
    this.detail = detail;
  }

  get kind(): InteropErrorDetail['kind'] {
    return this.detail.kind;
  }
}
