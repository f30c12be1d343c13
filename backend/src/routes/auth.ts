/**
 * Auth Routes — Demo login, logout and dashboards
 *
 * Mounted at /api. Login checks the static credential table and returns a
 * bearer token; the dashboard route answers with the student or teacher view
 * for whoever holds the token.
 */
import { Router } from 'express';
import type { AppContext } from '../context.js';
import { bearerToken, currentUser } from '../middleware/auth.js';
import { bodyOf } from '../middleware/body.js';
import { buildStudentDashboard, buildTeacherDashboard } from '../services/dashboard.js';

export function createAuthRoutes({ gradebook, auth }: AppContext): Router {
  const router = Router();

  router.post('/auth/login', (req, res) => {
    const body = bodyOf(req);
    const userId = typeof body.userId === 'string' ? body.userId.trim() : '';
    const password = typeof body.password === 'string' ? body.password : '';
    console.log(`[AUTH] POST /login - ${userId || '(no user id)'}`);

    const result = auth.login(userId, password);
    if (!result.success) {
      return res.status(401).json({ error: result.message });
    }
    res.json({ token: result.token, user: result.user, message: result.message });
  });

  router.post('/auth/logout', (req, res) => {
    const token = bearerToken(req);
    res.json({ message: token ? auth.logout(token) : 'No user logged in' });
  });

  router.get('/auth/me', (req, res) => {
    const user = currentUser(req, auth);
    if (!user) {
      return res.status(401).json({ error: 'Login required' });
    }
    res.json(user);
  });

  router.get('/dashboard', (req, res) => {
    const user = currentUser(req, auth);
    if (!user) {
      return res.status(401).json({ error: 'Login required' });
    }
    console.log(`[AUTH] GET /dashboard - ${user.id} (${user.role})`);

    const dashboard = user.role === 'student'
      ? buildStudentDashboard(gradebook, user.id)
      : buildTeacherDashboard(gradebook, user.id);
    if (!dashboard) {
      return res.status(404).json({ error: user.role === 'student' ? 'Student not found' : 'Teacher not found' });
    }
    res.json({ role: user.role, dashboard });
  });

  return router;
}
