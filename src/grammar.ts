import { MalformedTokenError } from './errors';

//   combined := spec ['=' spec]
//   spec     := id [':' id]
//   option   := id ['=' id]
//   id       := [0-9]+

export interface IdSpec {
  primary: number;
  secondary?: number;
}

export interface MappingToken {
  container: IdSpec;
  host?: IdSpec;
}

export interface OptionToken {
  container: number;
  host?: number;
}

const DIGITS = /^[0-9]+$/;

function splitOnce(token: string, raw: string, delimiter: string, what: string): [string, string | undefined] {
  const parts = raw.split(delimiter);
  if (parts.length > 2) {
    throw new MalformedTokenError(token, `more than one '${delimiter}' in ${what}`);
  }
  return [parts[0], parts[1]];
}

function parseId(token: string, segment: string, what: string): number {
  if (segment.length === 0) {
    throw new MalformedTokenError(token, `${what} is empty`);
  }
  if (!DIGITS.test(segment)) {
    throw new MalformedTokenError(token, `${what} '${segment}' is not a non-negative integer`);
  }
  return parseInt(segment, 10);
}

function parseSpec(token: string, raw: string, side: string): IdSpec {
  const [primary, secondary] = splitOnce(token, raw, ':', `${side} ids`);
  const spec: IdSpec = { primary: parseId(token, primary, `${side} uid`) };
  if (secondary !== undefined) spec.secondary = parseId(token, secondary, `${side} gid`);
  return spec;
}

function trimmed(token: string): string {
  const t = token.trim();
  if (!t) throw new MalformedTokenError(token, 'empty mapping');
  return t;
}

/** Parse `lxc_uid[:lxc_gid][=host_uid[:host_gid]]`. */
export function parseMappingToken(token: string): MappingToken {
  const t = trimmed(token);
  const [container, host] = splitOnce(token, t, '=', 'mapping');
  const parsed: MappingToken = { container: parseSpec(token, container, 'container') };
  if (host !== undefined) parsed.host = parseSpec(token, host, 'host');
  return parsed;
}

/** Parse `id[=host_id]` as given to --user / --group. */
export function parseOptionToken(token: string): OptionToken {
  const t = trimmed(token);
  if (t.includes(':')) {
    throw new MalformedTokenError(token, "':' is not allowed here; use a plain mapping for uid:gid pairs");
  }
  const [container, host] = splitOnce(token, t, '=', 'mapping');
  const parsed: OptionToken = { container: parseId(token, container, 'container id') };
  if (host !== undefined) parsed.host = parseId(token, host, 'host id');
  return parsed;
}
