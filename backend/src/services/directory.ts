import { z } from 'zod';
import { AppError, errorMessage, isAppError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type { AuditLog } from './audit.js';
import type { RoleTable } from './groupResolver.js';
import type { Principal } from './tokenValidator.js';

export interface DirectoryUser {
  id: string;
  username: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  enabled: boolean;
  emailVerified: boolean;
  createdAt?: number;
  groups?: string[];
}

export interface DirectoryGroup {
  id: string;
  name: string;
  path: string;
  subGroups?: DirectoryGroup[];
}

/** An active login session at the identity provider. Times are ISO strings. */
export interface UserSession {
  id: string;
  userId: string;
  username: string;
  ipAddress?: string;
  startedAt: string;
  lastAccessAt: string;
  clients: string[];
}

/** The SSH public key a user pinned for certificate signing. */
export interface RegisteredSshKey {
  publicKey: string;
  registeredAt: string;
}

const name = z.string().trim().max(255);

export const listUsersQuerySchema = z.object({
  first: z.coerce.number().int().min(0).default(0),
  max: z.coerce.number().int().min(1).max(100).default(20),
  search: z.string().trim().min(1).max(255).optional(),
});
export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;

export const pageQuerySchema = listUsersQuerySchema.omit({ search: true });
export type PageQuery = z.infer<typeof pageQuerySchema>;

export const createUserSchema = z
  .object({
    username: z.string().trim().min(1).max(255),
    email: z.string().trim().email().optional(),
    firstName: name.optional(),
    lastName: name.optional(),
    enabled: z.boolean().default(true),
    password: z.string().min(8).max(1024).optional(),
    temporaryPassword: z.boolean().default(true),
  })
  .strict();
export type CreateUserInput = z.infer<typeof createUserSchema>;

export const updateUserSchema = z
  .object({
    email: z.string().trim().email().optional(),
    firstName: name.optional(),
    lastName: name.optional(),
    enabled: z.boolean().optional(),
  })
  .strict()
  .refine((v) => Object.values(v).some((field) => field !== undefined), 'nothing to update');
export type UpdateUserInput = z.infer<typeof updateUserSchema>;

export const resetPasswordSchema = z
  .object({
    password: z.string().min(8).max(1024),
    temporary: z.boolean().default(true),
  })
  .strict();
export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;

/** The identity provider's user/group administration surface. */
export interface DirectoryProvider {
  listUsers(query: ListUsersQuery, signal?: AbortSignal): Promise<DirectoryUser[]>;
  getUser(id: string, signal?: AbortSignal): Promise<DirectoryUser>;
  createUser(input: CreateUserInput, signal?: AbortSignal): Promise<string>;
  updateUser(id: string, input: UpdateUserInput, signal?: AbortSignal): Promise<void>;
  deleteUser(id: string, signal?: AbortSignal): Promise<void>;
  resetPassword(id: string, input: ResetPasswordInput, signal?: AbortSignal): Promise<void>;
  userGroups(id: string, signal?: AbortSignal): Promise<DirectoryGroup[]>;
  addUserToGroup(userId: string, groupId: string, signal?: AbortSignal): Promise<void>;
  removeUserFromGroup(userId: string, groupId: string, signal?: AbortSignal): Promise<void>;
  listGroups(signal?: AbortSignal): Promise<DirectoryGroup[]>;
  groupMembers(groupId: string, page: PageQuery, signal?: AbortSignal): Promise<DirectoryUser[]>;
  /** Exact, case-insensitive username match. */
  findUserByUsername(username: string, signal?: AbortSignal): Promise<DirectoryUser | undefined>;
  userSessions(id: string, signal?: AbortSignal): Promise<UserSession[]>;
  /** Ends every session of the user. */
  logoutUser(id: string, signal?: AbortSignal): Promise<void>;
  getSshKey(userId: string, signal?: AbortSignal): Promise<RegisteredSshKey | undefined>;
  /** `undefined` removes the key. */
  setSshKey(userId: string, key: RegisteredSshKey | undefined, signal?: AbortSignal): Promise<void>;
}

export interface AdminContext {
  principal: Principal;
  requestId?: string;
  signal?: AbortSignal;
}

interface MutationSpec<T> {
  action: string;
  targetType: 'user' | 'membership';
  targetId: string | ((result: T) => string);
  details?: Record<string, unknown>;
}

/**
 * Privileged directory operations. Admin status is re-derived from the
 * caller's groups on every call. Mutations are audited after the provider
 * accepts them; a failed audit write is reported but the change stays.
 */
export class DirectoryAdminGateway {
  constructor(
    private readonly provider: DirectoryProvider,
    private readonly roles: RoleTable,
    private readonly audit: AuditLog,
    private readonly log: Logger = componentLogger('directory'),
  ) {}

  async listUsers(ctx: AdminContext, query: ListUsersQuery): Promise<DirectoryUser[]> {
    this.authorize(ctx);
    return this.provider.listUsers(query, ctx.signal);
  }

  async getUser(ctx: AdminContext, id: string): Promise<DirectoryUser> {
    this.authorize(ctx);
    const [user, groups] = await Promise.all([this.provider.getUser(id, ctx.signal), this.provider.userGroups(id, ctx.signal)]);
    return { ...user, groups: groups.map((g) => g.name) };
  }

  async createUser(ctx: AdminContext, input: CreateUserInput): Promise<DirectoryUser> {
    const id = await this.mutate(ctx, {
      action: 'user.create',
      targetType: 'user',
      targetId: (createdId: string) => createdId,
      details: { username: input.username, initialPassword: input.password !== undefined },
    }, () => this.provider.createUser(input, ctx.signal));
    return {
      id,
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      enabled: input.enabled,
      emailVerified: false,
    };
  }

  updateUser(ctx: AdminContext, id: string, input: UpdateUserInput): Promise<void> {
    return this.mutate(ctx, { action: 'user.update', targetType: 'user', targetId: id, details: { fields: Object.keys(input) } }, () =>
      this.provider.updateUser(id, input, ctx.signal),
    );
  }

  deleteUser(ctx: AdminContext, id: string): Promise<void> {
    return this.mutate(ctx, { action: 'user.delete', targetType: 'user', targetId: id }, () => this.provider.deleteUser(id, ctx.signal));
  }

  resetPassword(ctx: AdminContext, id: string, input: ResetPasswordInput): Promise<void> {
    return this.mutate(ctx, { action: 'user.reset_password', targetType: 'user', targetId: id, details: { temporary: input.temporary } }, () =>
      this.provider.resetPassword(id, input, ctx.signal),
    );
  }

  async userSessions(ctx: AdminContext, id: string): Promise<UserSession[]> {
    this.authorize(ctx);
    return this.provider.userSessions(id, ctx.signal);
  }

  logoutUser(ctx: AdminContext, id: string): Promise<void> {
    return this.mutate(ctx, { action: 'user.logout', targetType: 'user', targetId: id }, () => this.provider.logoutUser(id, ctx.signal));
  }

  async userGroups(ctx: AdminContext, id: string): Promise<DirectoryGroup[]> {
    this.authorize(ctx);
    return this.provider.userGroups(id, ctx.signal);
  }

  addUserToGroup(ctx: AdminContext, userId: string, groupId: string): Promise<void> {
    return this.mutate(ctx, { action: 'group.add_member', targetType: 'membership', targetId: userId, details: { groupId } }, () =>
      this.provider.addUserToGroup(userId, groupId, ctx.signal),
    );
  }

  removeUserFromGroup(ctx: AdminContext, userId: string, groupId: string): Promise<void> {
    return this.mutate(ctx, { action: 'group.remove_member', targetType: 'membership', targetId: userId, details: { groupId } }, () =>
      this.provider.removeUserFromGroup(userId, groupId, ctx.signal),
    );
  }

  async listGroups(ctx: AdminContext): Promise<DirectoryGroup[]> {
    this.authorize(ctx);
    return this.provider.listGroups(ctx.signal);
  }

  async groupMembers(ctx: AdminContext, groupId: string, page: PageQuery): Promise<DirectoryUser[]> {
    this.authorize(ctx);
    return this.provider.groupMembers(groupId, page, ctx.signal);
  }

  private authorize(ctx: AdminContext): void {
    if (!this.roles.isAdmin(this.roles.tryResolve(ctx.principal.groups))) throw new AppError('Forbidden', 'administrator role required');
  }

  private async mutate<T>(ctx: AdminContext, change: MutationSpec<T>, run: () => Promise<T>): Promise<T> {
    this.authorize(ctx);
    const actor = ctx.principal.username;
    let result: T;
    try {
      result = await run();
    } catch (err) {
      this.audit.tryRecord({
        actor,
        action: change.action,
        result: 'failure',
        targetType: change.targetType,
        targetId: typeof change.targetId === 'string' ? change.targetId : undefined,
        requestId: ctx.requestId,
        details: { ...change.details, code: isAppError(err) ? err.code : 'Internal', reason: errorMessage(err) },
      });
      throw err;
    }
    const targetId = typeof change.targetId === 'string' ? change.targetId : change.targetId(result);
    this.audit.record({
      actor,
      action: change.action,
      result: 'success',
      targetType: change.targetType,
      targetId,
      requestId: ctx.requestId,
      details: change.details,
    });
    this.log.info({ actor, action: change.action, targetId, requestId: ctx.requestId }, 'directory change applied');
    return result;
  }
}
