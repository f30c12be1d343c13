/**
 * Assignments — The closed family of graded items
 *
 * Homework, Quiz, Project and Exam share validation and serialization through
 * the abstract Assignment base and differ only in how they turn points into a
 * percentage. New variants are registered in ASSIGNMENT_VARIANTS; the factory
 * functions dispatch through that table by tag.
 */
import { InvalidArgumentError } from './errors.js';
import type { AssignmentRecord } from './records.js';

export const ASSIGNMENT_TYPES = ['Homework', 'Quiz', 'Project', 'Exam'] as const;

export type AssignmentType = (typeof ASSIGNMENT_TYPES)[number];

function validateName(name: string): void {
  if (!name.trim()) {
    throw new InvalidArgumentError('Assignment name cannot be empty');
  }
}

function validatePoints(points: number): void {
  if (!Number.isFinite(points) || points < 0) {
    throw new InvalidArgumentError('points cannot be negative');
  }
}

function validateMaxPoints(maxPoints: number): void {
  if (!Number.isFinite(maxPoints) || maxPoints <= 0) {
    throw new InvalidArgumentError('max_points must be positive');
  }
}

function validateWeek(week: number): void {
  if (!Number.isInteger(week)) {
    throw new InvalidArgumentError('week must be a whole number');
  }
}

export abstract class Assignment {
  abstract readonly type: AssignmentType;

  readonly name: string;
  readonly week: number;
  private _points: number;
  private _maxPoints: number;

  constructor(name: string, points: number, maxPoints: number, week = 1) {
    validateName(name);
    validateMaxPoints(maxPoints);
    validatePoints(points);
    validateWeek(week);

    this.name = name;
    this._points = points;
    this._maxPoints = maxPoints;
    this.week = week;
  }

  get points(): number {
    return this._points;
  }

  get maxPoints(): number {
    return this._maxPoints;
  }

  protected get ratio(): number {
    return this._points / this._maxPoints;
  }

  abstract calculatePercentage(): number;

  /** Replaces both scores, or neither if either value is invalid. */
  update(points: number, maxPoints: number): void {
    validatePoints(points);
    validateMaxPoints(maxPoints);
    this._points = points;
    this._maxPoints = maxPoints;
  }

  describe(): string {
    return `${this.name}: ${this._points}/${this._maxPoints} (${this.calculatePercentage().toFixed(1)}%)`;
  }

  toRecord(): AssignmentRecord {
    return {
      type: this.type,
      name: this.name,
      points: this._points,
      max_points: this._maxPoints,
      week: this.week,
    };
  }
}

export class Homework extends Assignment {
  readonly type = 'Homework' as const;

  calculatePercentage(): number {
    return this.ratio * 100;
  }
}

/** Quizzes are weighted at 1.2x and capped at 100%. */
export class Quiz extends Assignment {
  readonly type = 'Quiz' as const;

  calculatePercentage(): number {
    return Math.min(this.ratio * 1.2 * 100, 100);
  }
}

/** Projects are weighted at 0.9x. */
export class Project extends Assignment {
  readonly type = 'Project' as const;

  calculatePercentage(): number {
    return this.ratio * 0.9 * 100;
  }
}

export class Exam extends Assignment {
  readonly type = 'Exam' as const;

  calculatePercentage(): number {
    return this.ratio * 100;
  }
}

type AssignmentConstructor = new (name: string, points: number, maxPoints: number, week?: number) => Assignment;

const ASSIGNMENT_VARIANTS: Record<AssignmentType, AssignmentConstructor> = {
  Homework,
  Quiz,
  Project,
  Exam,
};

/**
 * Resolves a variant tag, matching case-insensitively.
 * Unknown or missing tags resolve to Homework. Saved files and CSV imports
 * rely on this, so a typo in a tag degrades to Homework rather than failing the load.
 */
export function resolveAssignmentType(tag: string | undefined): AssignmentType {
  const normalized = (tag ?? '').trim().toLowerCase();
  return ASSIGNMENT_TYPES.find(type => type.toLowerCase() === normalized) ?? 'Homework';
}

export function createAssignment(
  tag: string | undefined,
  name: string,
  points: number,
  maxPoints: number,
  week = 1
): Assignment {
  const Variant = ASSIGNMENT_VARIANTS[resolveAssignmentType(tag)];
  return new Variant(name, points, maxPoints, week);
}

export function assignmentFromRecord(record: AssignmentRecord): Assignment {
  return createAssignment(record.type, record.name, record.points, record.max_points, record.week);
}
