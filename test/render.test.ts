import { describe, it, expect } from 'vitest';
import { generateIdmap, type IdmapInput } from '../src/core';
import { resolveConfig } from '../src/config';
import { renderConfLines, renderJson, renderSubids, renderText, reservations, toJson } from '../src/render';

function idmapOf(partial: Partial<IdmapInput>) {
  return generateIdmap({ mappings: [], users: [], groups: [], ...partial });
}

const defaults = resolveConfig({}, {});

describe('text rendering', () => {
  it('renders the config fragment and the subid reservations', () => {
    expect(renderText(idmapOf({ mappings: ['1000'] }), defaults)).toBe(
      '\n' +
        '# Add to /etc/pve/lxc/<container_id>.conf:\n' +
        'lxc.idmap = u 0 100000 1000\n' +
        'lxc.idmap = u 1000 1000 1\n' +
        'lxc.idmap = u 1001 101001 64535\n' +
        'lxc.idmap = g 0 100000 1000\n' +
        'lxc.idmap = g 1000 1000 1\n' +
        'lxc.idmap = g 1001 101001 64535\n' +
        '\n' +
        '# Add to /etc/subuid:\n' +
        'root:1000:1\n' +
        '\n' +
        '# Add to /etc/subgid:\n' +
        'root:1000:1\n'
    );
  });

  it('renders one line per record', () => {
    expect(renderConfLines(idmapOf({ groups: ['500=600'] }).records)).toEqual([
      'lxc.idmap = u 0 100000 65536',
      'lxc.idmap = g 0 100000 500',
      'lxc.idmap = g 500 600 1',
      'lxc.idmap = g 501 100501 65035',
    ]);
  });

  it('leaves a class block empty when nothing was mapped for it', () => {
    expect(renderSubids(idmapOf({ users: ['1000'] }).records, 'root')).toBe(
      '\n# Add to /etc/subuid:\nroot:1000:1\n\n# Add to /etc/subgid:\n'
    );
  });

  it('writes reservations for the configured owner', () => {
    expect(renderSubids(idmapOf({ mappings: ['1000:2000=3000:4000'] }).records, 'lxcadmin')).toBe(
      '\n# Add to /etc/subuid:\nlxcadmin:3000:1\n\n# Add to /etc/subgid:\nlxcadmin:4000:1\n'
    );
  });
});

describe('reservations', () => {
  it('only lists explicit mappings, in container id order', () => {
    const { records } = idmapOf({ users: ['1002=9', '1000=7'] });
    expect(reservations(records, 'user')).toEqual([7, 9]);
    expect(reservations(records, 'group')).toEqual([]);
  });
});

describe('json rendering', () => {
  it('describes records, lines and reservations', () => {
    const config = resolveConfig({ vmid: '101' }, {});
    const idmap = idmapOf({ groups: ['500=600'] });
    expect(toJson(idmap, config)).toEqual({
      conf_path: '/etc/pve/lxc/101.conf',
      owner: 'root',
      idmap: [
        { class: 'user', kind: 'filler', container_start: 0, host_start: 100000, length: 65536 },
        { class: 'group', kind: 'filler', container_start: 0, host_start: 100000, length: 500 },
        { class: 'group', kind: 'mapped', container_start: 500, host_start: 600, length: 1 },
        { class: 'group', kind: 'filler', container_start: 501, host_start: 100501, length: 65035 },
      ],
      lines: [
        'lxc.idmap = u 0 100000 65536',
        'lxc.idmap = g 0 100000 500',
        'lxc.idmap = g 500 600 1',
        'lxc.idmap = g 501 100501 65035',
      ],
      subuid: [],
      subgid: [600],
    });
    const out = renderJson(idmap, config);
    expect(out.endsWith('}\n')).toBe(true);
    expect(JSON.parse(out)).toEqual(toJson(idmap, config));
  });
});
