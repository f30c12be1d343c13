/**
 * App — Express application assembly
 *
 * Configures middleware (CORS, JSON parsing, request logging) and mounts the
 * auth, student, teacher, grade, class and data routers under /api. The
 * gradebook and its collaborators are passed in, so each app instance serves
 * exactly the state it was given.
 */
import express, { type Express } from 'express';
import cors from 'cors';
import type { AppContext } from './context.js';
import { createAuthRoutes } from './routes/auth.js';
import { createClassRoutes } from './routes/classes.js';
import { createDataRoutes } from './routes/data.js';
import { createGradeRoutes } from './routes/grades.js';
import { createStudentRoutes } from './routes/students.js';
import { createTeacherRoutes } from './routes/teachers.js';

export function createApp(context: AppContext): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(`[${req.method}] ${req.path} - ${res.statusCode} (${duration}ms)`);
    });
    next();
  });

  // Routes
  app.use('/api', createAuthRoutes(context));
  app.use('/api/students', createStudentRoutes(context));
  app.use('/api/teachers', createTeacherRoutes(context));
  app.use('/api/grades', createGradeRoutes(context));
  app.use('/api/classes', createClassRoutes(context));
  app.use('/api/data', createDataRoutes(context));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}
