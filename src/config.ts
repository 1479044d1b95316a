import { ConfigError } from './errors';

export const DEFAULT_OWNER = 'root';
export const DEFAULT_CONF_DIR = '/etc/pve/lxc';

export interface ConfigOptions {
  owner?: string;
  confDir?: string;
  vmid?: string;
}

export interface IdmapConfig {
  /** Host account the subuid/subgid lines are written for. */
  owner: string;
  confDir: string;
  vmid?: number;
}

const OWNER_RE = /^[a-z_][a-z0-9_-]*$/;

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key];
  return v && v.trim().length > 0 ? v.trim() : undefined;
}

// CLI option wins, then LXC_IDMAP_* from the environment, then the Proxmox defaults.
export function resolveConfig(opts: ConfigOptions = {}, env: NodeJS.ProcessEnv = process.env): IdmapConfig {
  const owner = (opts.owner ?? fromEnv(env, 'LXC_IDMAP_OWNER') ?? DEFAULT_OWNER).trim();
  if (!OWNER_RE.test(owner)) {
    throw new ConfigError(`Invalid owner '${owner}'. Use a host account name such as 'root'.`);
  }
  const rawDir = (opts.confDir ?? fromEnv(env, 'LXC_IDMAP_CONF_DIR') ?? DEFAULT_CONF_DIR).trim();
  const confDir = rawDir.replace(/\/+$/, '') || '/';
  const config: IdmapConfig = { owner, confDir };
  if (opts.vmid !== undefined) {
    const vmid = parseInt(opts.vmid, 10);
    if (!/^\d+$/.test(opts.vmid.trim()) || !Number.isInteger(vmid) || vmid < 1) {
      throw new ConfigError(`Invalid --vmid '${opts.vmid}'. Use a positive container id, e.g. 101.`);
    }
    config.vmid = vmid;
  }
  return config;
}

export function confPath(config: IdmapConfig): string {
  const file = `${config.vmid ?? '<container_id>'}.conf`;
  return config.confDir === '/' ? `/${file}` : `${config.confDir}/${file}`;
}
