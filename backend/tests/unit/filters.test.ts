import { describe, it, expect } from 'vitest';
import { Quiz } from '../../src/models/assignment.js';
import { Gradebook } from '../../src/models/gradebook.js';
import { Student } from '../../src/models/student.js';
import {
  AssignmentTypeFilter,
  FilterPipeline,
  LateSubmissionFilter,
  PassingScoreFilter,
  ScoreRangeFilter,
  StudentNameFilter,
  WeekFilter,
  filterByAssignmentType,
  filterByScoreRange,
  filterByStudentName,
  filterByWeek,
  filterLateSubmissions,
  toGradeRecords,
  type GradeRecord,
} from '../../src/services/filters.js';

const alice: GradeRecord = { name: 'Alice', assignment_type: 'Quiz', score: 95, is_late: false, week: 1 };
const bob: GradeRecord = { name: 'Bob', assignment_type: 'homework', score: 55, is_late: true, week: 1 };
const aliceExam: GradeRecord = { name: 'alice', assignment_type: 'Exam', score: 72, week: 2 };
const cara: GradeRecord = { name: 'Cara', assignment_type: 'quiz', is_late: true, week: 2 };

const records = [alice, bob, aliceExam, cara];

describe('grade filters', () => {
  it('matches assignment types case-insensitively', () => {
    expect(new AssignmentTypeFilter('QUIZ').apply(records)).toEqual([alice, cara]);
  });

  it('keeps only late submissions', () => {
    expect(new LateSubmissionFilter().apply(records)).toEqual([bob, cara]);
  });

  it('treats a missing score as zero', () => {
    expect(new ScoreRangeFilter().apply(records)).toEqual(records);
    expect(new ScoreRangeFilter(1).apply(records)).toEqual([alice, bob, aliceExam]);
  });

  it('includes both ends of a score range', () => {
    expect(new ScoreRangeFilter(55, 72).apply(records)).toEqual([bob, aliceExam]);
  });

  it('matches student names case-insensitively', () => {
    expect(new StudentNameFilter('ALICE').apply(records)).toEqual([alice, aliceExam]);
  });

  it('matches an exact week', () => {
    expect(new WeekFilter(2).apply(records)).toEqual([aliceExam, cara]);
    expect(new WeekFilter(3).apply(records)).toEqual([]);
  });

  it('uses 60 as the default passing score', () => {
    expect(new PassingScoreFilter().apply(records)).toEqual([alice, aliceExam]);
    expect(new PassingScoreFilter(50).apply(records)).toEqual([alice, bob, aliceExam]);
  });
});

describe('FilterPipeline', () => {
  it('is the identity when empty', () => {
    expect(new FilterPipeline().applyAll(records)).toEqual(records);
  });

  it('applies every filter in order', () => {
    const pipeline = new FilterPipeline()
      .addFilter(new AssignmentTypeFilter('quiz'))
      .addFilter(new LateSubmissionFilter());

    expect(pipeline.size).toBe(2);
    expect(pipeline.applyAll(records)).toEqual([cara]);
  });

  it('can be cleared', () => {
    const pipeline = new FilterPipeline().addFilter(new WeekFilter(9));
    expect(pipeline.applyAll(records)).toEqual([]);

    pipeline.clearFilters();
    expect(pipeline.size).toBe(0);
    expect(pipeline.applyAll(records)).toEqual(records);
  });

  it('does not modify its input', () => {
    const input = [...records];
    new FilterPipeline().addFilter(new PassingScoreFilter()).applyAll(input);
    expect(input).toEqual(records);
  });
});

describe('convenience functions', () => {
  it('wrap the matching filter', () => {
    expect(filterByAssignmentType(records, 'exam')).toEqual([aliceExam]);
    expect(filterLateSubmissions(records)).toEqual([bob, cara]);
    expect(filterByScoreRange(records, 90)).toEqual([alice]);
    expect(filterByStudentName(records, 'bob')).toEqual([bob]);
    expect(filterByWeek(records, 1)).toEqual([alice, bob]);
  });
});

describe('toGradeRecords', () => {
  it('flattens each grade into a record', () => {
    const gradebook = new Gradebook();
    const student = new Student('s1', 'Ann');
    student.enroll('MATH');
    student.addAssignment('MATH', new Quiz('Q1', 8, 10, 3));
    gradebook.addStudent(student);

    expect(toGradeRecords(gradebook)).toEqual([
      {
        student_id: 's1',
        name: 'Ann',
        class_name: 'MATH',
        assignment_name: 'Q1',
        assignment_type: 'Quiz',
        points: 8,
        max_points: 10,
        score: 96,
        week: 3,
      },
    ]);
  });

  it('feeds straight into a pipeline', () => {
    const gradebook = new Gradebook();
    const student = new Student('s1', 'Ann');
    student.enroll('MATH');
    student.addAssignment('MATH', new Quiz('Q1', 4, 10));
    student.addAssignment('MATH', new Quiz('Q2', 9, 10));
    gradebook.addStudent(student);

    const passing = new FilterPipeline().addFilter(new PassingScoreFilter()).applyAll(toGradeRecords(gradebook));
    expect(passing.map(r => r.assignment_name)).toEqual(['Q2']);
  });
});
