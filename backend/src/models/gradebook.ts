/**
 * Gradebook — Aggregation root for students and teachers
 *
 * Owns every Student and Teacher by id. Grade mutations are checked here for
 * student existence and then handed to the Student, which enforces
 * enrollment. Class-wide figures are computed from the students' own
 * per-class averages.
 */
import type { Assignment } from './assignment.js';
import { NotFoundError } from './errors.js';
import type { GradebookRecord } from './records.js';
import { Student, averageOf } from './student.js';
import { Teacher } from './teacher.js';

export class Gradebook {
  private readonly _students = new Map<string, Student>();
  private readonly _teachers = new Map<string, Teacher>();

  get students(): Student[] {
    return [...this._students.values()];
  }

  get teachers(): Teacher[] {
    return [...this._teachers.values()];
  }

  get studentCount(): number {
    return this._students.size;
  }

  get teacherCount(): number {
    return this._teachers.size;
  }

  // Re-adding an id replaces the earlier entry outright
  addStudent(student: Student): void {
    this._students.set(student.studentId, student);
  }

  getStudent(studentId: string): Student | undefined {
    return this._students.get(studentId);
  }

  removeStudent(studentId: string): void {
    this._students.delete(studentId);
  }

  addTeacher(teacher: Teacher): void {
    this._teachers.set(teacher.teacherId, teacher);
  }

  getTeacher(teacherId: string): Teacher | undefined {
    return this._teachers.get(teacherId);
  }

  removeTeacher(teacherId: string): void {
    this._teachers.delete(teacherId);
  }

  addGrade(studentId: string, className: string, assignment: Assignment): void {
    this.requireStudent(studentId).addAssignment(className, assignment);
  }

  updateGrade(studentId: string, className: string, assignmentName: string, points: number, maxPoints: number): void {
    this.requireStudent(studentId).updateAssignment(className, assignmentName, points, maxPoints);
  }

  deleteGrade(studentId: string, className: string, assignmentName: string): void {
    this.requireStudent(studentId).deleteAssignment(className, assignmentName);
  }

  getClassRoster(className: string): Student[] {
    return this.students.filter(student => student.isEnrolled(className));
  }

  /**
   * Average of the roster's per-student class averages. Each student counts
   * once no matter how many assignments they have; students with no grades
   * in the class are left out.
   */
  getClassAverage(className: string): number | null {
    const averages: number[] = [];
    for (const student of this.getClassRoster(className)) {
      const average = student.getClassAverage(className);
      if (average !== null) averages.push(average);
    }
    return averageOf(averages);
  }

  toRecord(): GradebookRecord {
    const record: GradebookRecord = { students: {}, teachers: {} };
    for (const [id, student] of this._students) {
      record.students[id] = student.toRecord();
    }
    for (const [id, teacher] of this._teachers) {
      record.teachers[id] = teacher.toRecord();
    }
    return record;
  }

  static fromRecord(record: GradebookRecord): Gradebook {
    const gradebook = new Gradebook();
    for (const studentRecord of Object.values(record.students)) {
      gradebook.addStudent(Student.fromRecord(studentRecord));
    }
    for (const teacherRecord of Object.values(record.teachers)) {
      gradebook.addTeacher(Teacher.fromRecord(teacherRecord));
    }
    return gradebook;
  }

  private requireStudent(studentId: string): Student {
    const student = this._students.get(studentId);
    if (!student) {
      throw new NotFoundError(`Student '${studentId}' not found`);
    }
    return student;
  }
}
