/**
 * Student Routes — Roster management and enrollment
 *
 * Listing and lookup are open to any caller; creating, removing, enrolling
 * and dropping need a teacher session. Mounted at /api/students.
 */
import { Router } from 'express';
import type { AppContext } from '../context.js';
import { requireRole } from '../middleware/auth.js';
import { bodyOf, optionalString, requireString } from '../middleware/body.js';
import { sendError } from '../middleware/errors.js';
import { NotFoundError } from '../models/errors.js';
import { Student } from '../models/student.js';
import { buildStudentDashboard } from '../services/dashboard.js';

export function createStudentRoutes({ gradebook, auth }: AppContext): Router {
  const router = Router();
  const teacherOnly = requireRole(auth, 'teacher');

  const findStudent = (studentId: string): Student => {
    const student = gradebook.getStudent(studentId);
    if (!student) {
      throw new NotFoundError(`Student '${studentId}' not found`);
    }
    return student;
  };

  // Get all students with their overall averages
  router.get('/', (req, res) => {
    console.log('[STUDENTS] GET / - Fetching all students');
    res.json(gradebook.students.map(s => ({
      studentId: s.studentId,
      name: s.name,
      major: s.major,
      classes: s.classes,
      overallAverage: s.getOverallAverage(),
    })));
  });

  router.get('/:id', (req, res) => {
    console.log(`[STUDENTS] GET /${req.params.id}`);
    const summary = buildStudentDashboard(gradebook, req.params.id);
    if (!summary) {
      return res.status(404).json({ error: `Student '${req.params.id}' not found` });
    }
    res.json(summary);
  });

  // Create or replace a student
  router.post('/', teacherOnly, (req, res) => {
    console.log('[STUDENTS] POST / - Creating student');
    try {
      const body = bodyOf(req);
      const student = new Student(
        requireString(body, 'studentId'),
        requireString(body, 'name'),
        optionalString(body, 'major')
      );
      if (Array.isArray(body.classes)) {
        for (const className of body.classes) {
          if (typeof className === 'string' && className.trim()) student.enroll(className.trim());
        }
      }
      gradebook.addStudent(student);
      res.status(201).json(student.toRecord());
    } catch (error) {
      sendError(res, 'STUDENTS', error, 'Failed to create student');
    }
  });

  router.delete('/:id', teacherOnly, (req, res) => {
    console.log(`[STUDENTS] DELETE /${req.params.id}`);
    try {
      findStudent(req.params.id);
      gradebook.removeStudent(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, 'STUDENTS', error, 'Failed to delete student');
    }
  });

  router.post('/:id/enroll', teacherOnly, (req, res) => {
    console.log(`[STUDENTS] POST /${req.params.id}/enroll`);
    try {
      const student = findStudent(req.params.id);
      student.enroll(requireString(bodyOf(req), 'className'));
      res.json(student.toRecord());
    } catch (error) {
      sendError(res, 'STUDENTS', error, 'Failed to enroll student');
    }
  });

  // Dropping a class discards every grade in it
  router.post('/:id/drop', teacherOnly, (req, res) => {
    console.log(`[STUDENTS] POST /${req.params.id}/drop`);
    try {
      const student = findStudent(req.params.id);
      student.drop(requireString(bodyOf(req), 'className'));
      res.json(student.toRecord());
    } catch (error) {
      sendError(res, 'STUDENTS', error, 'Failed to drop class');
    }
  });

  return router;
}
