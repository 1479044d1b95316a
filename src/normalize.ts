import { OutOfRangeError } from './errors';
import { parseMappingToken, parseOptionToken } from './grammar';
import { type IdClass, type PointMapping, isInIdRange } from './ids';

export interface IdmapInput {
  /** Combined tokens, `lxc_uid[:lxc_gid][=host_uid[:host_gid]]`. */
  mappings: readonly string[];
  /** `--user` tokens, `id[=host_id]`; user class only. */
  users: readonly string[];
  /** `--group` tokens, `id[=host_id]`; group class only. */
  groups: readonly string[];
}

export function isEmptyInput(input: IdmapInput): boolean {
  return input.mappings.length === 0 && input.users.length === 0 && input.groups.length === 0;
}

export function pointsFromMapping(token: string): [PointMapping, PointMapping] {
  const { container, host = container } = parseMappingToken(token);
  return [
    { idClass: 'user', containerId: container.primary, hostId: host.primary },
    {
      idClass: 'group',
      containerId: container.secondary ?? container.primary,
      hostId: host.secondary ?? host.primary,
    },
  ];
}

export function pointFromOption(idClass: IdClass, token: string): PointMapping {
  const { container, host = container } = parseOptionToken(token);
  return { idClass, containerId: container, hostId: host };
}

export function validatePoints(points: readonly PointMapping[]): void {
  for (const p of points) {
    if (!isInIdRange(p.containerId)) throw new OutOfRangeError(p.containerId, p.idClass, 'container');
    if (!isInIdRange(p.hostId)) throw new OutOfRangeError(p.hostId, p.idClass, 'host');
  }
}

/**
 * Expand raw tokens into validated point mappings. Order follows the input:
 * combined tokens (user then group point each), then --user, then --group.
 */
export function normalizeMappings(input: IdmapInput): PointMapping[] {
  const points: PointMapping[] = [];
  for (const token of input.mappings) points.push(...pointsFromMapping(token));
  for (const token of input.users) points.push(pointFromOption('user', token));
  for (const token of input.groups) points.push(pointFromOption('group', token));
  validatePoints(points);
  return points;
}
