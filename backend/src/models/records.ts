/**
 * Gradebook Records — Persisted JSON shapes and their decoder
 *
 * These are the snake_case records written to gradebook_data.json. The
 * decoder narrows parsed JSON into them: optional fields get their defaults
 * and a missing or mistyped required field throws InvalidArgumentError.
 */
import { InvalidArgumentError } from './errors.js';

export interface AssignmentRecord {
  type: string;
  name: string;
  points: number;
  max_points: number;
  week: number;
}

export interface StudentRecord {
  student_id: string;
  name: string;
  major: string;
  classes: string[];
  grades: Record<string, Record<string, AssignmentRecord>>;
}

export interface TeacherRecord {
  teacher_id: string;
  name: string;
  department: string;
  courses_taught: string[];
}

export interface GradebookRecord {
  students: Record<string, StudentRecord>;
  teachers: Record<string, TeacherRecord>;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new InvalidArgumentError(`${where} must be an object`);
  }
  return value;
}

function requireString(data: JsonObject, key: string, where: string): string {
  const value = data[key];
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${where} is missing '${key}'`);
  }
  return value;
}

function requireNumber(data: JsonObject, key: string, where: string): number {
  const value = data[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidArgumentError(`${where} is missing '${key}'`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidArgumentError(`${where} must be a list of strings`);
  }
  return value;
}

function objectEntries(value: unknown, where: string): [string, unknown][] {
  if (value === undefined) return [];
  return Object.entries(expectObject(value, where));
}

export function parseAssignmentRecord(value: unknown, where = 'assignment'): AssignmentRecord {
  const data = expectObject(value, where);
  const week = data.week;
  return {
    // Left as-is; the assignment factory decides what an unknown tag means
    type: typeof data.type === 'string' ? data.type : 'Homework',
    name: requireString(data, 'name', where),
    points: requireNumber(data, 'points', where),
    max_points: requireNumber(data, 'max_points', where),
    week: typeof week === 'number' ? week : 1,
  };
}

export function parseStudentRecord(value: unknown, where = 'student'): StudentRecord {
  const data = expectObject(value, where);
  const studentId = requireString(data, 'student_id', where);
  const label = `student '${studentId}'`;

  const grades: StudentRecord['grades'] = {};
  for (const [className, assignments] of objectEntries(data.grades, `${label} grades`)) {
    grades[className] = {};
    for (const [assignmentName, assignment] of objectEntries(assignments, `${label} grades for ${className}`)) {
      grades[className][assignmentName] = parseAssignmentRecord(
        assignment,
        `${label} assignment '${assignmentName}'`
      );
    }
  }

  return {
    student_id: studentId,
    name: requireString(data, 'name', label),
    major: typeof data.major === 'string' ? data.major : 'Undeclared',
    classes: stringList(data.classes, `${label} classes`),
    grades,
  };
}

export function parseTeacherRecord(value: unknown, where = 'teacher'): TeacherRecord {
  const data = expectObject(value, where);
  const teacherId = requireString(data, 'teacher_id', where);
  const label = `teacher '${teacherId}'`;
  return {
    teacher_id: teacherId,
    name: requireString(data, 'name', label),
    department: requireString(data, 'department', label),
    courses_taught: stringList(data.courses_taught, `${label} courses_taught`),
  };
}

export function parseGradebookRecord(value: unknown): GradebookRecord {
  const data = expectObject(value, 'gradebook');
  const record: GradebookRecord = { students: {}, teachers: {} };

  for (const [id, student] of objectEntries(data.students, 'students')) {
    record.students[id] = parseStudentRecord(student, `student '${id}'`);
  }
  for (const [id, teacher] of objectEntries(data.teachers, 'teachers')) {
    record.teachers[id] = parseTeacherRecord(teacher, `teacher '${id}'`);
  }
  return record;
}
