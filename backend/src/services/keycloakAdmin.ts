import axios, { type AxiosInstance, type AxiosResponse, type Method } from 'axios';
import { z } from 'zod';
import { AppError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type {
  CreateUserInput,
  DirectoryGroup,
  DirectoryProvider,
  DirectoryUser,
  ListUsersQuery,
  PageQuery,
  RegisteredSshKey,
  ResetPasswordInput,
  UpdateUserInput,
  UserSession,
} from './directory.js';
import { pathSegment, translateUpstreamError, upstreamStatus } from './upstream.js';

export interface KeycloakAdminOptions {
  url: string;
  realm: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  now?: () => number;
}

const tokenResponse = z.object({ access_token: z.string().min(1), expires_in: z.number().positive() });

const userRepresentation = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  enabled: z.boolean().default(true),
  emailVerified: z.boolean().default(false),
  createdTimestamp: z.number().optional(),
});

const attributes = z.record(z.array(z.string()));

/** Full representation kept as-is so a PUT does not drop fields we do not model. */
const userWithAttributes = z.object({ id: z.string(), attributes: attributes.optional() }).passthrough();

const sessionRepresentation = z.object({
  id: z.string(),
  username: z.string(),
  userId: z.string(),
  ipAddress: z.string().optional(),
  start: z.number(),
  lastAccess: z.number(),
  clients: z.record(z.string()).default({}),
});

export const SSH_KEY_ATTRIBUTE = 'ssh_public_key';
export const SSH_KEY_REGISTERED_ATTRIBUTE = 'ssh_key_registered_at';

interface GroupRepresentation {
  id: string;
  name: string;
  path?: string;
  subGroups?: GroupRepresentation[];
}

const groupRepresentation: z.ZodType<GroupRepresentation> = z.lazy(() =>
  z.object({
    id: z.string(),
    name: z.string(),
    path: z.string().optional(),
    subGroups: z.array(groupRepresentation).optional(),
  }),
);

const TOKEN_EARLY_REFRESH_MS = 30_000;
const SERVICE = 'directory';

function toUser(rep: z.infer<typeof userRepresentation>): DirectoryUser {
  return {
    id: rep.id,
    username: rep.username,
    email: rep.email,
    firstName: rep.firstName,
    lastName: rep.lastName,
    enabled: rep.enabled,
    emailVerified: rep.emailVerified,
    createdAt: rep.createdTimestamp,
  };
}

function toGroup(rep: GroupRepresentation): DirectoryGroup {
  return {
    id: rep.id,
    name: rep.name,
    path: rep.path ?? `/${rep.name}`,
    subGroups: rep.subGroups?.length ? rep.subGroups.map(toGroup) : undefined,
  };
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new AppError('UpstreamUnavailable', 'directory returned an unexpected response');
  return parsed.data;
}

/** Keycloak admin REST client authenticated with its own client-credentials grant. */
export class KeycloakAdminClient implements DirectoryProvider {
  private readonly http: AxiosInstance;
  private readonly tokenUrl: string;
  private readonly now: () => number;
  private token?: { value: string; expiresAt: number };
  private tokenInflight?: Promise<string>;

  constructor(
    private readonly opts: KeycloakAdminOptions,
    private readonly log: Logger = componentLogger('keycloak-admin'),
  ) {
    const realm = pathSegment(opts.realm, 'realm');
    this.http = axios.create({
      baseURL: `${opts.url}/admin/realms/${realm}/`,
      timeout: opts.timeoutMs,
      headers: { Accept: 'application/json' },
    });
    this.tokenUrl = `${opts.url}/realms/${realm}/protocol/openid-connect/token`;
    this.now = opts.now ?? Date.now;
  }

  async listUsers(query: ListUsersQuery, signal?: AbortSignal): Promise<DirectoryUser[]> {
    const res = await this.send('get', 'users', { params: { first: query.first, max: query.max, search: query.search, briefRepresentation: false }, signal });
    return parseBody(z.array(userRepresentation), res.data).map(toUser);
  }

  async getUser(id: string, signal?: AbortSignal): Promise<DirectoryUser> {
    const res = await this.send('get', `users/${pathSegment(id, 'user id')}`, { signal });
    return toUser(parseBody(userRepresentation, res.data));
  }

  async createUser(input: CreateUserInput, signal?: AbortSignal): Promise<string> {
    const body = {
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      enabled: input.enabled,
      credentials: input.password ? [{ type: 'password', value: input.password, temporary: input.temporaryPassword }] : undefined,
    };
    const res = await this.send('post', 'users', { data: body, signal });
    const location: unknown = res.headers['location'];
    const id = typeof location === 'string' ? location.replace(/\/+$/, '').split('/').pop() : undefined;
    if (!id) throw new AppError('UpstreamUnavailable', 'directory did not return the new user id');
    return id;
  }

  async updateUser(id: string, input: UpdateUserInput, signal?: AbortSignal): Promise<void> {
    await this.send('put', `users/${pathSegment(id, 'user id')}`, { data: input, signal });
  }

  async deleteUser(id: string, signal?: AbortSignal): Promise<void> {
    await this.send('delete', `users/${pathSegment(id, 'user id')}`, { signal });
  }

  async resetPassword(id: string, input: ResetPasswordInput, signal?: AbortSignal): Promise<void> {
    await this.send('put', `users/${pathSegment(id, 'user id')}/reset-password`, {
      data: { type: 'password', value: input.password, temporary: input.temporary },
      signal,
    });
  }

  async userGroups(id: string, signal?: AbortSignal): Promise<DirectoryGroup[]> {
    const res = await this.send('get', `users/${pathSegment(id, 'user id')}/groups`, { signal });
    return parseBody(z.array(groupRepresentation), res.data).map(toGroup);
  }

  async addUserToGroup(userId: string, groupId: string, signal?: AbortSignal): Promise<void> {
    await this.send('put', `users/${pathSegment(userId, 'user id')}/groups/${pathSegment(groupId, 'group id')}`, { signal });
  }

  async removeUserFromGroup(userId: string, groupId: string, signal?: AbortSignal): Promise<void> {
    await this.send('delete', `users/${pathSegment(userId, 'user id')}/groups/${pathSegment(groupId, 'group id')}`, { signal });
  }

  async listGroups(signal?: AbortSignal): Promise<DirectoryGroup[]> {
    const res = await this.send('get', 'groups', { signal });
    return parseBody(z.array(groupRepresentation), res.data).map(toGroup);
  }

  async groupMembers(groupId: string, page: PageQuery, signal?: AbortSignal): Promise<DirectoryUser[]> {
    const res = await this.send('get', `groups/${pathSegment(groupId, 'group id')}/members`, {
      params: { first: page.first, max: page.max },
      signal,
    });
    return parseBody(z.array(userRepresentation), res.data).map(toUser);
  }

  async findUserByUsername(username: string, signal?: AbortSignal): Promise<DirectoryUser | undefined> {
    const res = await this.send('get', 'users', { params: { username, exact: true, briefRepresentation: false }, signal });
    const wanted = username.toLowerCase();
    const match = parseBody(z.array(userRepresentation), res.data).find((u) => u.username.toLowerCase() === wanted);
    return match && toUser(match);
  }

  async userSessions(id: string, signal?: AbortSignal): Promise<UserSession[]> {
    const res = await this.send('get', `users/${pathSegment(id, 'user id')}/sessions`, { signal });
    return parseBody(z.array(sessionRepresentation), res.data).map((rep) => ({
      id: rep.id,
      userId: rep.userId,
      username: rep.username,
      ipAddress: rep.ipAddress,
      startedAt: new Date(rep.start).toISOString(),
      lastAccessAt: new Date(rep.lastAccess).toISOString(),
      clients: Object.values(rep.clients),
    }));
  }

  async logoutUser(id: string, signal?: AbortSignal): Promise<void> {
    await this.send('post', `users/${pathSegment(id, 'user id')}/logout`, { signal });
  }

  async getSshKey(userId: string, signal?: AbortSignal): Promise<RegisteredSshKey | undefined> {
    const rep = await this.userRepresentation(userId, signal);
    const publicKey = rep.attributes?.[SSH_KEY_ATTRIBUTE]?.[0];
    if (!publicKey) return undefined;
    return { publicKey, registeredAt: rep.attributes?.[SSH_KEY_REGISTERED_ATTRIBUTE]?.[0] ?? '' };
  }

  /** Keycloak replaces the attribute map on update, so the stored one is merged first. */
  async setSshKey(userId: string, key: RegisteredSshKey | undefined, signal?: AbortSignal): Promise<void> {
    const rep = await this.userRepresentation(userId, signal);
    const merged: Record<string, string[]> = { ...rep.attributes };
    if (key) {
      merged[SSH_KEY_ATTRIBUTE] = [key.publicKey];
      merged[SSH_KEY_REGISTERED_ATTRIBUTE] = [key.registeredAt];
    } else {
      delete merged[SSH_KEY_ATTRIBUTE];
      delete merged[SSH_KEY_REGISTERED_ATTRIBUTE];
    }
    await this.send('put', `users/${pathSegment(userId, 'user id')}`, { data: { ...rep, attributes: merged }, signal });
  }

  private async userRepresentation(id: string, signal?: AbortSignal): Promise<z.infer<typeof userWithAttributes>> {
    const res = await this.send('get', `users/${pathSegment(id, 'user id')}`, { signal });
    return parseBody(userWithAttributes, res.data);
  }

  /** Sends an admin call; a 401 drops the cached token and retries once. */
  private async send(
    method: Method,
    url: string,
    opts: { data?: unknown; params?: Record<string, unknown>; signal?: AbortSignal },
  ): Promise<AxiosResponse<unknown>> {
    for (let attempt = 0; ; attempt++) {
      const token = await this.accessToken();
      try {
        return await this.http.request<unknown>({
          method,
          url,
          data: opts.data,
          params: opts.params,
          signal: opts.signal,
          headers: { Authorization: `Bearer ${token}` },
        });
      } catch (err) {
        if (attempt === 0 && upstreamStatus(err) === 401) {
          this.log.debug('admin token rejected, fetching a new one');
          if (this.token?.value === token) this.token = undefined;
          continue;
        }
        throw translateUpstreamError(SERVICE, err);
      }
    }
  }

  private accessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt - TOKEN_EARLY_REFRESH_MS) {
      return Promise.resolve(this.token.value);
    }
    if (!this.tokenInflight) {
      this.tokenInflight = this.fetchToken().finally(() => {
        this.tokenInflight = undefined;
      });
    }
    return this.tokenInflight;
  }

  private async fetchToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
    });
    let data: unknown;
    try {
      ({ data } = await this.http.post(this.tokenUrl, form));
    } catch (err) {
      const translated = translateUpstreamError(SERVICE, err);
      if (translated.code === 'UpstreamUnavailable') throw translated;
      throw new AppError('UpstreamUnavailable', `directory admin login failed: ${translated.message}`, { cause: err });
    }
    const parsed = parseBody(tokenResponse, data);
    this.token = { value: parsed.access_token, expiresAt: this.now() + parsed.expires_in * 1000 };
    return parsed.access_token;
  }
}
