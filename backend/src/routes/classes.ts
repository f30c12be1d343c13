import { Router } from 'express';
import type { AppContext } from '../context.js';

export function createClassRoutes({ gradebook }: AppContext): Router {
  const router = Router();

  // Class average is the mean of each enrolled student's own average
  router.get('/:code', (req, res) => {
    const className = req.params.code;
    console.log(`[CLASSES] GET /${className}`);

    const roster = gradebook.getClassRoster(className);
    res.json({
      className,
      average: gradebook.getClassAverage(className),
      teachers: gradebook.teachers.filter(t => t.teaches(className)).map(t => t.name),
      roster: roster.map(s => ({
        studentId: s.studentId,
        name: s.name,
        major: s.major,
        average: s.getClassAverage(className),
        assignmentCount: s.getAssignments(className).length,
      })),
    });
  });

  return router;
}
