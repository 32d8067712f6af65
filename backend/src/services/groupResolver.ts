import { z } from 'zod';
import { AppError } from '../errors.js';

/** An authorization tier, loaded once from the roles table and never mutated. */
export interface Role {
  readonly name: string;
  /** Name of the signing role on the PKI backend. */
  readonly signingRole: string;
  readonly maxTtlSeconds: number;
  readonly principals: readonly string[];
  readonly precedence: number;
}

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Parses `90s`, `30m`, `12h`, `1d` (or a bare number of seconds) into seconds. */
export function parseDuration(text: string): number {
  const match = /^(\d+)([smhd]?)$/.exec(text.trim());
  if (!match) throw new Error(`invalid duration: ${JSON.stringify(text)}`);
  const unit = match[2] || 's';
  return Number(match[1]) * DURATION_UNITS[unit];
}

export function formatDuration(seconds: number): string {
  if (seconds % 86400 === 0) return `${seconds / 86400}d`;
  if (seconds % 3600 === 0) return `${seconds / 3600}h`;
  if (seconds % 60 === 0) return `${seconds / 60}m`;
  return `${seconds}s`;
}

const durationSchema = z.string().transform((value, ctx) => {
  try {
    const seconds = parseDuration(value);
    if (seconds <= 0) throw new Error('duration must be positive');
    return seconds;
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

const roleSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'role names are alphanumeric with - and _'),
  signingRole: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'signing role must be a single path segment'),
  maxTtl: durationSchema,
  principals: z.array(z.string().min(1)).min(1),
  precedence: z.number().int(),
});

export const roleTableSchema = z
  .object({
    roles: z.array(roleSchema).min(1),
    groups: z.record(z.string().min(1), z.string().min(1)),
  })
  .superRefine((table, ctx) => {
    const names = new Set<string>();
    for (const role of table.roles) {
      if (names.has(role.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['roles'], message: `duplicate role ${role.name}` });
      }
      names.add(role.name);
    }
    for (const [group, roleName] of Object.entries(table.groups)) {
      if (!names.has(roleName)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['groups', group], message: `unknown role ${roleName}` });
      }
    }
  });

export type RoleTableInput = z.input<typeof roleTableSchema>;

function normalizeGroup(group: string): string {
  return group.startsWith('/') ? group.slice(1) : group;
}

/**
 * Ordered group→role precedence table.
 *
 * Roles are ranked by precedence (highest first); equal precedence falls back
 * to ascending role name so resolution never depends on input order. The
 * top-ranked role is the administrative tier.
 */
export class RoleTable {
  readonly roles: readonly Role[];
  private readonly byName: ReadonlyMap<string, Role>;
  private readonly rank: ReadonlyMap<string, number>;
  private readonly groupToRole: ReadonlyMap<string, Role>;

  constructor(input: unknown) {
    const parsed = roleTableSchema.parse(input);
    const roles: Role[] = parsed.roles
      .map((r) =>
        Object.freeze({
          name: r.name,
          signingRole: r.signingRole,
          maxTtlSeconds: r.maxTtl,
          principals: Object.freeze([...r.principals]),
          precedence: r.precedence,
        }),
      )
      .sort((a, b) => b.precedence - a.precedence || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    this.roles = Object.freeze(roles);
    this.byName = new Map(roles.map((r) => [r.name, r]));
    this.rank = new Map(roles.map((r, i) => [r.name, i]));
    const groups = new Map<string, Role>();
    for (const [group, roleName] of Object.entries(parsed.groups)) {
      const role = this.byName.get(roleName);
      if (role) groups.set(normalizeGroup(group), role);
    }
    this.groupToRole = groups;
  }

  get adminRole(): Role {
    return this.roles[0];
  }

  isAdmin(role: Role | undefined): boolean {
    return role !== undefined && role.name === this.adminRole.name;
  }

  get(name: string): Role | undefined {
    return this.byName.get(name);
  }

  /** Highest-ranked role reachable from the group set. */
  resolve(groups: Iterable<string>): Role {
    let best: Role | undefined;
    for (const group of groups) {
      const role = this.groupToRole.get(normalizeGroup(group));
      if (role && (best === undefined || this.rankOf(role) < this.rankOf(best))) best = role;
    }
    if (!best) throw new AppError('NoEligibleRole', 'group membership does not map to any role');
    return best;
  }

  tryResolve(groups: Iterable<string>): Role | undefined {
    try {
      return this.resolve(groups);
    } catch (err) {
      if (err instanceof AppError && err.code === 'NoEligibleRole') return undefined;
      throw err;
    }
  }

  /** Roles a holder of `role` may request: itself and everything ranked below it. */
  rolesAtOrBelow(role: Role): Role[] {
    const limit = this.rankOf(role);
    return this.roles.filter((r) => this.rankOf(r) >= limit);
  }

  /** True when `candidate` does not outrank `granted`. */
  permits(granted: Role, candidate: Role): boolean {
    return this.rankOf(candidate) >= this.rankOf(granted);
  }

  private rankOf(role: Role): number {
    const rank = this.rank.get(role.name);
    if (rank === undefined) throw new AppError('Internal', `role ${role.name} is not part of this table`);
    return rank;
  }
}
