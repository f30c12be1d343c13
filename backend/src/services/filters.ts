/**
 * Grade Filters — Composable predicates over flat grade records
 *
 * Filters work on plain GradeRecord objects, never on model classes; use
 * toGradeRecords() to flatten a gradebook first. A FilterPipeline runs its
 * filters left to right, so the result is the AND of every predicate.
 */
import type { Gradebook } from '../models/gradebook.js';
import { roundScore } from '../models/student.js';

export interface GradeRecord {
  name?: string;
  assignment_type?: string;
  score?: number;
  is_late?: boolean;
  week?: number;
  [field: string]: unknown;
}

export interface GradeFilter {
  apply(records: GradeRecord[]): GradeRecord[];
}

// Missing scores count as zero and missing late flags as on time
const scoreOf = (record: GradeRecord): number => record.score ?? 0;
const isLate = (record: GradeRecord): boolean => record.is_late ?? false;

export class AssignmentTypeFilter implements GradeFilter {
  private readonly assignmentType: string;

  constructor(assignmentType: string) {
    this.assignmentType = assignmentType.toLowerCase();
  }

  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(r => (r.assignment_type ?? '').toLowerCase() === this.assignmentType);
  }
}

export class LateSubmissionFilter implements GradeFilter {
  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(isLate);
  }
}

export class ScoreRangeFilter implements GradeFilter {
  constructor(
    private readonly minScore = 0,
    private readonly maxScore = 100
  ) {}

  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(r => {
      const score = scoreOf(r);
      return score >= this.minScore && score <= this.maxScore;
    });
  }
}

export class StudentNameFilter implements GradeFilter {
  private readonly studentName: string;

  constructor(studentName: string) {
    this.studentName = studentName.toLowerCase();
  }

  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(r => (r.name ?? '').toLowerCase() === this.studentName);
  }
}

export class WeekFilter implements GradeFilter {
  constructor(private readonly weekNumber: number) {}

  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(r => r.week === this.weekNumber);
  }
}

export class PassingScoreFilter implements GradeFilter {
  constructor(private readonly passingScore = 60) {}

  apply(records: GradeRecord[]): GradeRecord[] {
    return records.filter(r => scoreOf(r) >= this.passingScore);
  }
}

export class FilterPipeline {
  private readonly filters: GradeFilter[] = [];

  addFilter(filter: GradeFilter): this {
    this.filters.push(filter);
    return this;
  }

  clearFilters(): void {
    this.filters.length = 0;
  }

  get size(): number {
    return this.filters.length;
  }

  applyAll(records: GradeRecord[]): GradeRecord[] {
    return this.filters.reduce((result, filter) => filter.apply(result), records);
  }
}

export function filterByAssignmentType(records: GradeRecord[], assignmentType: string): GradeRecord[] {
  return new AssignmentTypeFilter(assignmentType).apply(records);
}

export function filterLateSubmissions(records: GradeRecord[]): GradeRecord[] {
  return new LateSubmissionFilter().apply(records);
}

export function filterByScoreRange(records: GradeRecord[], minScore = 0, maxScore = 100): GradeRecord[] {
  return new ScoreRangeFilter(minScore, maxScore).apply(records);
}

export function filterByStudentName(records: GradeRecord[], studentName: string): GradeRecord[] {
  return new StudentNameFilter(studentName).apply(records);
}

export function filterByWeek(records: GradeRecord[], weekNumber: number): GradeRecord[] {
  return new WeekFilter(weekNumber).apply(records);
}

/** Flattens every grade in the gradebook into one record per (student, class, assignment). */
export function toGradeRecords(gradebook: Gradebook): GradeRecord[] {
  const records: GradeRecord[] = [];
  for (const student of gradebook.students) {
    for (const [className, assignment] of student.gradeEntries()) {
      records.push({
        student_id: student.studentId,
        name: student.name,
        class_name: className,
        assignment_name: assignment.name,
        assignment_type: assignment.type,
        points: assignment.points,
        max_points: assignment.maxPoints,
        score: roundScore(assignment.calculatePercentage()),
        week: assignment.week,
      });
    }
  }
  return records;
}
