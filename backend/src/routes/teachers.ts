import { Router } from 'express';
import type { AppContext } from '../context.js';
import { requireRole } from '../middleware/auth.js';
import { bodyOf, requireString } from '../middleware/body.js';
import { sendError } from '../middleware/errors.js';
import { NotFoundError } from '../models/errors.js';
import { Teacher } from '../models/teacher.js';

export function createTeacherRoutes({ gradebook, auth }: AppContext): Router {
  const router = Router();
  const teacherOnly = requireRole(auth, 'teacher');

  const findTeacher = (teacherId: string): Teacher => {
    const teacher = gradebook.getTeacher(teacherId);
    if (!teacher) {
      throw new NotFoundError(`Teacher '${teacherId}' not found`);
    }
    return teacher;
  };

  router.get('/', (req, res) => {
    console.log('[TEACHERS] GET / - Fetching all teachers');
    res.json(gradebook.teachers.map(t => t.toRecord()));
  });

  router.post('/', teacherOnly, (req, res) => {
    console.log('[TEACHERS] POST / - Creating teacher');
    try {
      const body = bodyOf(req);
      const teacher = new Teacher(
        requireString(body, 'teacherId'),
        requireString(body, 'name'),
        requireString(body, 'department')
      );
      if (Array.isArray(body.coursesTaught)) {
        for (const course of body.coursesTaught) {
          if (typeof course === 'string' && course.trim()) teacher.addCourse(course.trim());
        }
      }
      gradebook.addTeacher(teacher);
      res.status(201).json(teacher.toRecord());
    } catch (error) {
      sendError(res, 'TEACHERS', error, 'Failed to create teacher');
    }
  });

  router.post('/:id/courses', teacherOnly, (req, res) => {
    console.log(`[TEACHERS] POST /${req.params.id}/courses`);
    try {
      const teacher = findTeacher(req.params.id);
      teacher.addCourse(requireString(bodyOf(req), 'courseCode'));
      res.json(teacher.toRecord());
    } catch (error) {
      sendError(res, 'TEACHERS', error, 'Failed to add course');
    }
  });

  router.delete('/:id/courses/:code', teacherOnly, (req, res) => {
    console.log(`[TEACHERS] DELETE /${req.params.id}/courses/${req.params.code}`);
    try {
      const teacher = findTeacher(req.params.id);
      teacher.removeCourse(req.params.code);
      res.json(teacher.toRecord());
    } catch (error) {
      sendError(res, 'TEACHERS', error, 'Failed to remove course');
    }
  });

  return router;
}
