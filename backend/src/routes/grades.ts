/**
 * Grade Routes — Filtered grade listing and grade mutations
 *
 *   GET    /                                        — grade records, narrowed by query filters
 *   POST   /                                        — add a grade (teacher)
 *   PUT    /:studentId/:className/:assignmentName   — replace points and max points (teacher)
 *   DELETE /:studentId/:className/:assignmentName   — remove a grade (teacher)
 *
 * Mounted at /api/grades.
 */
import { Router, type Request } from 'express';
import type { AppContext } from '../context.js';
import { requireRole } from '../middleware/auth.js';
import { bodyOf, optionalNumber, optionalString, queryNumber, queryString, requireNumber, requireString } from '../middleware/body.js';
import { sendError } from '../middleware/errors.js';
import { createAssignment } from '../models/assignment.js';
import {
  AssignmentTypeFilter,
  FilterPipeline,
  LateSubmissionFilter,
  PassingScoreFilter,
  ScoreRangeFilter,
  StudentNameFilter,
  WeekFilter,
  toGradeRecords,
} from '../services/filters.js';

// Builds the pipeline from ?type=&student=&week=&minScore=&maxScore=&passing=&late=true
export function pipelineFromQuery(req: Request): FilterPipeline {
  const pipeline = new FilterPipeline();

  const type = queryString(req, 'type');
  if (type) pipeline.addFilter(new AssignmentTypeFilter(type));

  const student = queryString(req, 'student');
  if (student) pipeline.addFilter(new StudentNameFilter(student));

  const week = queryNumber(req, 'week');
  if (week !== undefined) pipeline.addFilter(new WeekFilter(week));

  const minScore = queryNumber(req, 'minScore');
  const maxScore = queryNumber(req, 'maxScore');
  if (minScore !== undefined || maxScore !== undefined) {
    pipeline.addFilter(new ScoreRangeFilter(minScore, maxScore));
  }

  const passing = queryNumber(req, 'passing');
  if (passing !== undefined) pipeline.addFilter(new PassingScoreFilter(passing));

  if (queryString(req, 'late') === 'true') pipeline.addFilter(new LateSubmissionFilter());

  return pipeline;
}

export function createGradeRoutes({ gradebook, auth }: AppContext): Router {
  const router = Router();
  const teacherOnly = requireRole(auth, 'teacher');

  router.get('/', (req, res) => {
    console.log('[GRADES] GET / - Filtering grades');
    try {
      const pipeline = pipelineFromQuery(req);
      const grades = pipeline.applyAll(toGradeRecords(gradebook));
      console.log(`[GRADES] ${grades.length} grades matched ${pipeline.size} filters`);
      res.json({ count: grades.length, grades });
    } catch (error) {
      sendError(res, 'GRADES', error, 'Failed to fetch grades');
    }
  });

  router.post('/', teacherOnly, (req, res) => {
    console.log('[GRADES] POST / - Adding grade');
    try {
      const body = bodyOf(req);
      const studentId = requireString(body, 'studentId');
      const className = requireString(body, 'className');
      const assignment = createAssignment(
        optionalString(body, 'assignmentType'),
        requireString(body, 'assignmentName'),
        requireNumber(body, 'points'),
        requireNumber(body, 'maxPoints'),
        optionalNumber(body, 'week')
      );

      gradebook.addGrade(studentId, className, assignment);
      res.status(201).json({
        message: `Grade added for ${studentId} in ${className}`,
        grade: assignment.toRecord(),
      });
    } catch (error) {
      sendError(res, 'GRADES', error, 'Failed to add grade');
    }
  });

  router.put('/:studentId/:className/:assignmentName', teacherOnly, (req, res) => {
    const { studentId, className, assignmentName } = req.params;
    console.log(`[GRADES] PUT /${studentId}/${className}/${assignmentName}`);
    try {
      const body = bodyOf(req);
      gradebook.updateGrade(studentId, className, assignmentName, requireNumber(body, 'points'), requireNumber(body, 'maxPoints'));
      res.json(gradebook.getStudent(studentId)?.getAssignment(className, assignmentName)?.toRecord());
    } catch (error) {
      sendError(res, 'GRADES', error, 'Failed to update grade');
    }
  });

  router.delete('/:studentId/:className/:assignmentName', teacherOnly, (req, res) => {
    const { studentId, className, assignmentName } = req.params;
    console.log(`[GRADES] DELETE /${studentId}/${className}/${assignmentName}`);
    try {
      gradebook.deleteGrade(studentId, className, assignmentName);
      res.json({ success: true });
    } catch (error) {
      sendError(res, 'GRADES', error, 'Failed to delete grade');
    }
  });

  return router;
}
