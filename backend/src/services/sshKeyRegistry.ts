import { AppError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type { AuditLog } from './audit.js';
import type { DirectoryProvider, DirectoryUser } from './directory.js';
import type { RegisteredKeySource } from './sshIssuer.js';
import { parseAuthorizedKey } from './sshKey.js';
import type { Principal } from './tokenValidator.js';

export interface RegisteredKeyView {
  publicKey: string;
  fingerprint: string;
  registeredAt: string;
}

export interface SelfContext {
  principal: Principal;
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * Self-service SSH key pinning, stored on the caller's directory account.
 * Callers are matched to accounts by username.
 */
export class SshKeyRegistry implements RegisteredKeySource {
  constructor(
    private readonly provider: DirectoryProvider,
    private readonly audit: AuditLog,
    private readonly now: () => number = Date.now,
    private readonly log: Logger = componentLogger('ssh-key-registry'),
  ) {}

  async registeredKey(username: string, signal?: AbortSignal): Promise<string | undefined> {
    const user = await this.provider.findUserByUsername(username, signal);
    if (!user) return undefined;
    return (await this.provider.getSshKey(user.id, signal))?.publicKey;
  }

  async get(ctx: SelfContext): Promise<RegisteredKeyView> {
    const user = await this.account(ctx);
    const stored = await this.provider.getSshKey(user.id, ctx.signal);
    if (!stored) throw new AppError('NotFound', 'no SSH key registered');
    return { publicKey: stored.publicKey, fingerprint: parseAuthorizedKey(stored.publicKey).fingerprint, registeredAt: stored.registeredAt };
  }

  async register(ctx: SelfContext, publicKey: string): Promise<RegisteredKeyView> {
    const key = parseAuthorizedKey(publicKey);
    const user = await this.account(ctx);
    const stored = { publicKey: `${key.type} ${key.blob.toString('base64')}`, registeredAt: new Date(this.now()).toISOString() };
    await this.provider.setSshKey(user.id, stored, ctx.signal);
    this.audit.record({
      actor: ctx.principal.username,
      action: 'ssh.key.register',
      result: 'success',
      targetType: 'user',
      targetId: user.id,
      requestId: ctx.requestId,
      details: { fingerprint: key.fingerprint, type: key.type },
    });
    this.log.info({ user: ctx.principal.username, fingerprint: key.fingerprint }, 'ssh key registered');
    return { ...stored, fingerprint: key.fingerprint };
  }

  async remove(ctx: SelfContext): Promise<void> {
    const user = await this.account(ctx);
    if (!(await this.provider.getSshKey(user.id, ctx.signal))) throw new AppError('NotFound', 'no SSH key registered');
    await this.provider.setSshKey(user.id, undefined, ctx.signal);
    this.audit.record({
      actor: ctx.principal.username,
      action: 'ssh.key.remove',
      result: 'success',
      targetType: 'user',
      targetId: user.id,
      requestId: ctx.requestId,
    });
  }

  private async account(ctx: SelfContext): Promise<DirectoryUser> {
    const user = await this.provider.findUserByUsername(ctx.principal.username, ctx.signal);
    if (!user) throw new AppError('NotFound', `user ${ctx.principal.username} not found in the directory`);
    return user;
  }
}
