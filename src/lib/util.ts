import { Decimal } from 'decimal.js';
import { RawLiteral, type BindingValue } from './literals.js';

/** Renders a converted binding value for terminal output. */
export function valueToDisplay(v: BindingValue): string {
  if (v === null) return '-';
  if (v instanceof RawLiteral) return `"${v.value}"^^${shortenIri(v.datatype)}`;
  if (v instanceof Decimal) return v.toString();
  if (v instanceof Date) return v.toISOString();
  if (v instanceof Uint8Array) return Buffer.from(v).toString('hex');
  if (typeof v === 'object') {
    return v.termType === 'BlankNode' ? `_:${v.value}` : shortenIri(v.value);
  }
  if (typeof v === 'string') return `"${v}"`;
  return String(v);
}

export function shortenIri(iri: string): string {
  // keep fragment or last path segment
  const hash = iri.lastIndexOf('#');
  if (hash >= 0 && hash < iri.length - 1) return iri.slice(hash + 1);
  const slash = iri.lastIndexOf('/');
  if (slash >= 0 && slash < iri.length - 1) return iri.slice(slash + 1);
  return iri;
}
