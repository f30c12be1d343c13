import { InvalidArgumentError } from './errors.js';
import type { TeacherRecord } from './records.js';

export class Teacher {
  readonly teacherId: string;
  readonly name: string;
  readonly department: string;
  private readonly _coursesTaught: string[] = [];

  constructor(teacherId: string, name: string, department: string) {
    if (!teacherId.trim()) {
      throw new InvalidArgumentError('teacher_id cannot be empty');
    }
    if (!name.trim()) {
      throw new InvalidArgumentError('name cannot be empty');
    }
    if (!department.trim()) {
      throw new InvalidArgumentError('department cannot be empty');
    }
    this.teacherId = teacherId;
    this.name = name;
    this.department = department;
  }

  get coursesTaught(): string[] {
    return [...this._coursesTaught];
  }

  teaches(courseCode: string): boolean {
    return this._coursesTaught.includes(courseCode);
  }

  addCourse(courseCode: string): void {
    if (!this.teaches(courseCode)) {
      this._coursesTaught.push(courseCode);
    }
  }

  removeCourse(courseCode: string): void {
    const index = this._coursesTaught.indexOf(courseCode);
    if (index !== -1) {
      this._coursesTaught.splice(index, 1);
    }
  }

  toRecord(): TeacherRecord {
    return {
      teacher_id: this.teacherId,
      name: this.name,
      department: this.department,
      courses_taught: this.coursesTaught,
    };
  }

  static fromRecord(record: TeacherRecord): Teacher {
    const teacher = new Teacher(record.teacher_id, record.name, record.department);
    for (const course of record.courses_taught) {
      teacher.addCourse(course);
    }
    return teacher;
  }
}
