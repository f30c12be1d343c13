import { Assignment, assignmentFromRecord } from './assignment.js';
import { InvalidArgumentError, NotEnrolledError, NotFoundError } from './errors.js';
import type { StudentRecord } from './records.js';

export const DEFAULT_MAJOR = 'Undeclared';

// Two-decimal rounding used for every reported average
export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function averageOf(values: number[]): number | null {
  if (values.length === 0) return null;
  const total = values.reduce((sum, value) => sum + value, 0);
  return roundScore(total / values.length);
}

export class Student {
  readonly studentId: string;
  readonly name: string;
  major: string;
  private readonly _classes = new Set<string>();
  // class name -> assignment name -> assignment
  private readonly _grades = new Map<string, Map<string, Assignment>>();

  constructor(studentId: string, name: string, major = DEFAULT_MAJOR) {
    if (!studentId.trim()) {
      throw new InvalidArgumentError('student_id cannot be empty');
    }
    if (!name.trim()) {
      throw new InvalidArgumentError('name cannot be empty');
    }
    this.studentId = studentId;
    this.name = name;
    this.major = major;
  }

  get classes(): string[] {
    return [...this._classes];
  }

  isEnrolled(className: string): boolean {
    return this._classes.has(className);
  }

  enroll(className: string): void {
    this._classes.add(className);
    if (!this._grades.has(className)) {
      this._grades.set(className, new Map());
    }
  }

  drop(className: string): void {
    this._classes.delete(className);
    this._grades.delete(className);
  }

  /** Adds a grade, replacing any existing assignment with the same name. */
  addAssignment(className: string, assignment: Assignment): void {
    const classGrades = this._grades.get(className);
    if (!this._classes.has(className) || !classGrades) {
      throw new NotEnrolledError(`${this.name} is not enrolled in ${className}`);
    }
    classGrades.set(assignment.name, assignment);
  }

  getAssignment(className: string, assignmentName: string): Assignment | undefined {
    return this._grades.get(className)?.get(assignmentName);
  }

  getAssignments(className: string): Assignment[] {
    return [...(this._grades.get(className)?.values() ?? [])];
  }

  updateAssignment(className: string, assignmentName: string, points: number, maxPoints: number): void {
    this.requireAssignment(className, assignmentName).update(points, maxPoints);
  }

  deleteAssignment(className: string, assignmentName: string): void {
    this.requireAssignment(className, assignmentName);
    this._grades.get(className)?.delete(assignmentName);
  }

  getClassAverage(className: string): number | null {
    return averageOf(this.getAssignments(className).map(a => a.calculatePercentage()));
  }

  getOverallAverage(): number | null {
    const percentages: number[] = [];
    for (const classGrades of this._grades.values()) {
      for (const assignment of classGrades.values()) {
        percentages.push(assignment.calculatePercentage());
      }
    }
    return averageOf(percentages);
  }

  /** Every (class, assignment) pair this student holds, in enrollment order. */
  *gradeEntries(): Generator<[string, Assignment]> {
    for (const [className, classGrades] of this._grades) {
      for (const assignment of classGrades.values()) {
        yield [className, assignment];
      }
    }
  }

  toRecord(): StudentRecord {
    const grades: StudentRecord['grades'] = {};
    for (const [className, classGrades] of this._grades) {
      grades[className] = {};
      for (const [assignmentName, assignment] of classGrades) {
        grades[className][assignmentName] = assignment.toRecord();
      }
    }
    return {
      student_id: this.studentId,
      name: this.name,
      major: this.major,
      classes: this.classes,
      grades,
    };
  }

  static fromRecord(record: StudentRecord): Student {
    const student = new Student(record.student_id, record.name, record.major);
    for (const className of record.classes) {
      student.enroll(className);
    }
    for (const [className, assignments] of Object.entries(record.grades)) {
      // Grades for a class missing from the list still imply enrollment
      student.enroll(className);
      for (const assignment of Object.values(assignments)) {
        student.addAssignment(className, assignmentFromRecord(assignment));
      }
    }
    return student;
  }

  private requireAssignment(className: string, assignmentName: string): Assignment {
    const classGrades = this._grades.get(className);
    if (!classGrades) {
      throw new NotFoundError(`No grades found for ${className}`);
    }
    const assignment = classGrades.get(assignmentName);
    if (!assignment) {
      throw new NotFoundError(`Assignment '${assignmentName}' not found`);
    }
    return assignment;
  }
}
