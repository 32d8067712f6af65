import { Request, RequestHandler, Router } from 'express';
import { principalOf } from '../middleware/authenticate.js';
import { asyncRoute } from '../middleware/recovery.js';
import {
  createUserSchema,
  listUsersQuerySchema,
  pageQuerySchema,
  resetPasswordSchema,
  updateUserSchema,
  type AdminContext,
  type DirectoryAdminGateway,
} from '../services/directory.js';

export function adminContext(req: Request): AdminContext {
  return { principal: principalOf(req), requestId: req.requestId, signal: req.abortSignal };
}

/** Mounted at /api/v1/users; `guard` must authenticate and require the admin role. */
export function usersRouter(directory: DirectoryAdminGateway, guard: RequestHandler[]): Router {
  const router = Router();
  router.use(guard);

  // GET /api/v1/users?first=0&max=20&search=term
  router.get('/', asyncRoute(async (req, res) => {
    const query = listUsersQuerySchema.parse(req.query);
    const items = await directory.listUsers(adminContext(req), query);
    res.json({ items, first: query.first, max: query.max });
  }));

  router.post('/', asyncRoute(async (req, res) => {
    const user = await directory.createUser(adminContext(req), createUserSchema.parse(req.body));
    res.status(201).json(user);
  }));

  router.get('/:id', asyncRoute(async (req, res) => {
    res.json(await directory.getUser(adminContext(req), req.params.id));
  }));

  router.put('/:id', asyncRoute(async (req, res) => {
    await directory.updateUser(adminContext(req), req.params.id, updateUserSchema.parse(req.body));
    res.status(204).end();
  }));

  router.delete('/:id', asyncRoute(async (req, res) => {
    await directory.deleteUser(adminContext(req), req.params.id);
    res.status(204).end();
  }));

  router.post('/:id/reset-password', asyncRoute(async (req, res) => {
    await directory.resetPassword(adminContext(req), req.params.id, resetPasswordSchema.parse(req.body));
    res.status(204).end();
  }));

  router.get('/:id/sessions', asyncRoute(async (req, res) => {
    res.json({ items: await directory.userSessions(adminContext(req), req.params.id) });
  }));

  // ends every session of the user at the identity provider
  router.post('/:id/logout', asyncRoute(async (req, res) => {
    await directory.logoutUser(adminContext(req), req.params.id);
    res.json({ status: 'logged_out' });
  }));

  router.get('/:id/groups', asyncRoute(async (req, res) => {
    res.json({ items: await directory.userGroups(adminContext(req), req.params.id) });
  }));

  router.put('/:id/groups/:groupId', asyncRoute(async (req, res) => {
    await directory.addUserToGroup(adminContext(req), req.params.id, req.params.groupId);
    res.status(204).end();
  }));

  router.delete('/:id/groups/:groupId', asyncRoute(async (req, res) => {
    await directory.removeUserFromGroup(adminContext(req), req.params.id, req.params.groupId);
    res.status(204).end();
  }));

  return router;
}

export function groupsRouter(directory: DirectoryAdminGateway, guard: RequestHandler[]): Router {
  const router = Router();
  router.use(guard);

  router.get('/', asyncRoute(async (req, res) => {
    res.json({ items: await directory.listGroups(adminContext(req)) });
  }));

  router.get('/:id/members', asyncRoute(async (req, res) => {
    const page = pageQuerySchema.parse(req.query);
    res.json({ items: await directory.groupMembers(adminContext(req), req.params.id, page), first: page.first, max: page.max });
  }));

  return router;
}
