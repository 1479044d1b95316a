import { type IdmapConfig, confPath } from './config';
import type { Idmap } from './core';
import { ID_CLASSES, ID_CLASS_INFO, type IdClass, type RangeRecord } from './ids';

export function renderConfLine(r: RangeRecord): string {
  return `lxc.idmap = ${ID_CLASS_INFO[r.idClass].letter} ${r.containerStart} ${r.hostStart} ${r.length}`;
}

export function renderConfLines(records: readonly RangeRecord[]): string[] {
  return records.map(renderConfLine);
}

export function renderConf(records: readonly RangeRecord[], config: IdmapConfig): string {
  return `\n# Add to ${confPath(config)}:\n` + renderConfLines(records).map((l) => l + '\n').join('');
}

/** Host ids the owner must be granted; fillers are never reserved. */
export function reservations(records: readonly RangeRecord[], idClass: IdClass): number[] {
  return records.filter((r) => r.idClass === idClass && r.kind === 'mapped').map((r) => r.hostStart);
}

export function renderSubids(records: readonly RangeRecord[], owner: string): string {
  return ID_CLASSES.map((idClass) => {
    const lines = reservations(records, idClass).map((id) => `${owner}:${id}:1\n`);
    return `\n# Add to ${ID_CLASS_INFO[idClass].subidFile}:\n` + lines.join('');
  }).join('');
}

export function renderText(idmap: Idmap, config: IdmapConfig): string {
  return renderConf(idmap.records, config) + renderSubids(idmap.records, config.owner);
}

export interface IdmapJson {
  conf_path: string;
  owner: string;
  idmap: Array<{ class: IdClass; kind: RangeRecord['kind']; container_start: number; host_start: number; length: number }>;
  lines: string[];
  subuid: number[];
  subgid: number[];
}

export function toJson(idmap: Idmap, config: IdmapConfig): IdmapJson {
  return {
    conf_path: confPath(config),
    owner: config.owner,
    idmap: idmap.records.map((r) => ({
      class: r.idClass,
      kind: r.kind,
      container_start: r.containerStart,
      host_start: r.hostStart,
      length: r.length,
    })),
    lines: renderConfLines(idmap.records),
    subuid: reservations(idmap.records, 'user'),
    subgid: reservations(idmap.records, 'group'),
  };
}

export function renderJson(idmap: Idmap, config: IdmapConfig): string {
  return JSON.stringify(toJson(idmap, config)) + '\n';
}
