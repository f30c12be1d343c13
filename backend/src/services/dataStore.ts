/**
 * DataStore — File persistence for the gradebook
 *
 * Saves and loads the JSON snapshot, imports grades and students from CSV, and
 * exports the JSON report, the flat grades CSV and per-class rosters. Every
 * file lives in the data directory except CSV imports, which are read from
 * the path given. No method throws for I/O or format problems; each reports
 * success and a message instead.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { config } from '../config.js';
import { createAssignment } from '../models/assignment.js';
import { InvalidArgumentError, isGradebookError, type OperationResult } from '../models/errors.js';
import { Gradebook } from '../models/gradebook.js';
import { parseGradebookRecord } from '../models/records.js';
import { DEFAULT_MAJOR, Student, roundScore } from '../models/student.js';
import { formatCsv, parseCsv, type CsvRow } from './csv.js';

export const GRADE_IMPORT_COLUMNS = [
  'student_id',
  'student_name',
  'class_name',
  'assignment_name',
  'assignment_type',
  'points',
  'max_points',
  'week',
];

const REQUIRED_GRADE_COLUMNS = ['student_id', 'student_name', 'class_name', 'assignment_name'];

export const GRADE_EXPORT_COLUMNS = [
  'student_id',
  'student_name',
  'major',
  'class_name',
  'assignment_name',
  'assignment_type',
  'points',
  'max_points',
  'percentage',
  'week',
];

export interface LoadResult {
  gradebook: Gradebook | null;
  message: string;
}

export interface ImportResult {
  imported: number;
  errors: string[];
  message: string;
}

export interface ClassReport {
  class_name: string;
  average: number | null;
  assignment_count: number;
}

export interface StudentReport {
  student_id: string;
  name: string;
  major: string;
  overall_average: number | null;
  classes: ClassReport[];
}

export interface GradesReport {
  summary: {
    total_students: number;
    total_teachers: number;
  };
  students: StudentReport[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Empty cells fall back to the column's default; anything else must be numeric
function parseNumber(text: string, column: string, fallback: number): number {
  if (text === '') return fallback;
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${column} must be a number, got '${text}'`);
  }
  return value;
}

function trimRow(row: CsvRow): CsvRow {
  const trimmed: CsvRow = {};
  for (const [key, value] of Object.entries(row)) {
    trimmed[key] = value.trim();
  }
  return trimmed;
}

export function buildGradesReport(gradebook: Gradebook): GradesReport {
  return {
    summary: {
      total_students: gradebook.studentCount,
      total_teachers: gradebook.teacherCount,
    },
    students: gradebook.students.map(student => ({
      student_id: student.studentId,
      name: student.name,
      major: student.major,
      overall_average: student.getOverallAverage(),
      classes: student.classes.map(className => ({
        class_name: className,
        average: student.getClassAverage(className),
        assignment_count: student.getAssignments(className).length,
      })),
    })),
  };
}

export class DataStore {
  readonly dataDir: string;
  readonly dataFile: string;

  constructor(dataDir: string = config.dataDir, dataFile: string = config.dataFile) {
    this.dataDir = dataDir;
    this.dataFile = dataFile;
    mkdirSync(this.dataDir, { recursive: true });
  }

  resolvePath(filename: string): string {
    return join(this.dataDir, filename);
  }

  saveGradebook(gradebook: Gradebook, filename = this.dataFile): OperationResult {
    const filePath = this.resolvePath(filename);
    try {
      writeFileSync(filePath, JSON.stringify(gradebook.toRecord(), null, 2), 'utf-8');
      console.log(`[DATA] Saved ${gradebook.studentCount} students to ${filePath}`);
      return { success: true, message: `Gradebook saved to ${filePath}` };
    } catch (error) {
      console.error('[DATA] Save failed:', error);
      return { success: false, message: `Error saving gradebook: ${errorMessage(error)}` };
    }
  }

  loadGradebook(filename = this.dataFile): LoadResult {
    const filePath = this.resolvePath(filename);
    if (!existsSync(filePath)) {
      return { gradebook: null, message: `File not found: ${filePath}` };
    }

    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (error) {
      return { gradebook: null, message: `Error reading file: ${errorMessage(error)}` };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      return { gradebook: null, message: `Error parsing JSON: ${errorMessage(error)}` };
    }

    try {
      const gradebook = Gradebook.fromRecord(parseGradebookRecord(data));
      console.log(`[DATA] Loaded ${gradebook.studentCount} students from ${filePath}`);
      return { gradebook, message: `Gradebook loaded from ${filePath}` };
    } catch (error) {
      if (isGradebookError(error)) {
        return { gradebook: null, message: `Error in data format: ${error.message}` };
      }
      throw error;
    }
  }

  importGradesFromCsv(gradebook: Gradebook, filePath: string): ImportResult {
    if (!existsSync(filePath)) {
      return { imported: 0, errors: [], message: `File not found: ${filePath}` };
    }
    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (error) {
      return { imported: 0, errors: [], message: `Error reading CSV: ${errorMessage(error)}` };
    }
    return this.importGradesFromCsvText(gradebook, text);
  }

  /**
   * Imports one grade per row. Unknown students are created and enrolled on
   * the fly. A bad row is recorded in `errors` and skipped; it never aborts
   * the rest of the file.
   */
  importGradesFromCsvText(gradebook: Gradebook, text: string): ImportResult {
    const { header, rows } = parseCsv(text);
    const missingColumns = REQUIRED_GRADE_COLUMNS.filter(column => !header.includes(column));
    if (missingColumns.length > 0) {
      return { imported: 0, errors: [], message: `Missing required columns: ${missingColumns.join(', ')}` };
    }

    let imported = 0;
    const errors: string[] = [];

    for (const { line, values } of rows) {
      const row = trimRow(values);
      if (REQUIRED_GRADE_COLUMNS.some(column => !row[column])) {
        errors.push(`Row ${line}: Missing required fields`);
        continue;
      }

      try {
        const assignment = createAssignment(
          row.assignment_type || 'homework',
          row.assignment_name,
          parseNumber(row.points ?? '', 'points', 0),
          parseNumber(row.max_points ?? '', 'max_points', 100),
          parseNumber(row.week ?? '', 'week', 1)
        );

        let student = gradebook.getStudent(row.student_id);
        if (!student) {
          student = new Student(row.student_id, row.student_name);
          gradebook.addStudent(student);
        }
        student.enroll(row.class_name);
        student.addAssignment(row.class_name, assignment);
        imported++;
      } catch (error) {
        if (!isGradebookError(error)) throw error;
        errors.push(`Row ${line}: ${error.message}`);
      }
    }

    let message = `Imported ${imported} grades`;
    if (errors.length > 0) {
      message += ` with ${errors.length} errors`;
    }
    console.log(`[DATA] ${message}`);
    return { imported, errors, message };
  }

  /** Imports students from `student_id,name,major,classes`; classes is a quoted list. */
  importStudentsFromCsv(gradebook: Gradebook, filePath: string): ImportResult {
    if (!existsSync(filePath)) {
      return { imported: 0, errors: [], message: `File not found: ${filePath}` };
    }

    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (error) {
      return { imported: 0, errors: [], message: `Error reading CSV: ${errorMessage(error)}` };
    }

    let imported = 0;
    const errors: string[] = [];
    for (const { line, values } of parseCsv(text).rows) {
      const row = trimRow(values);
      if (!row.student_id || !row.name) {
        errors.push(`Row ${line}: Missing student_id or name`);
        continue;
      }

      const student = new Student(row.student_id, row.name, row.major || DEFAULT_MAJOR);
      for (const className of (row.classes ?? '').split(/[;,]/)) {
        if (className.trim()) student.enroll(className.trim());
      }
      gradebook.addStudent(student);
      imported++;
    }

    console.log(`[DATA] Imported ${imported} students`);
    return { imported, errors, message: `Imported ${imported} students` };
  }

  exportGradesReport(gradebook: Gradebook, filename = 'grades_report.json'): OperationResult {
    const filePath = this.resolvePath(filename);
    try {
      writeFileSync(filePath, JSON.stringify(buildGradesReport(gradebook), null, 2), 'utf-8');
      return { success: true, message: `Report exported to ${filePath}` };
    } catch (error) {
      console.error('[DATA] Report export failed:', error);
      return { success: false, message: `Error exporting report: ${errorMessage(error)}` };
    }
  }

  exportGradesToCsv(gradebook: Gradebook, filename = 'grades_export.csv'): OperationResult {
    const filePath = this.resolvePath(filename);
    const rows: (string | number)[][] = [];
    for (const student of gradebook.students) {
      for (const [className, assignment] of student.gradeEntries()) {
        rows.push([
          student.studentId,
          student.name,
          student.major,
          className,
          assignment.name,
          assignment.type,
          assignment.points,
          assignment.maxPoints,
          roundScore(assignment.calculatePercentage()),
          assignment.week,
        ]);
      }
    }

    try {
      writeFileSync(filePath, formatCsv(GRADE_EXPORT_COLUMNS, rows), 'utf-8');
      return { success: true, message: `Grades exported to ${filePath}` };
    } catch (error) {
      console.error('[DATA] CSV export failed:', error);
      return { success: false, message: `Error exporting CSV: ${errorMessage(error)}` };
    }
  }

  exportClassRoster(gradebook: Gradebook, className: string, filename = `${className}_roster.csv`): OperationResult {
    const roster = gradebook.getClassRoster(className);
    if (roster.length === 0) {
      return { success: false, message: `No students found in ${className}` };
    }

    const filePath = this.resolvePath(filename);
    const rows = roster.map(student => {
      const average = student.getClassAverage(className);
      return [student.studentId, student.name, student.major, average ?? 'N/A'];
    });

    try {
      writeFileSync(filePath, formatCsv(['student_id', 'name', 'major', 'class_average'], rows), 'utf-8');
      return { success: true, message: `Roster exported to ${filePath}` };
    } catch (error) {
      console.error('[DATA] Roster export failed:', error);
      return { success: false, message: `Error exporting roster: ${errorMessage(error)}` };
    }
  }
}
