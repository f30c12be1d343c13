import { describe, it, expect, beforeEach } from 'vitest';
import { Exam, Homework, Project, Quiz } from '../../src/models/assignment.js';
import { InvalidArgumentError, NotEnrolledError, NotFoundError } from '../../src/models/errors.js';
import { Student } from '../../src/models/student.js';

describe('Student', () => {
  let student: Student;

  beforeEach(() => {
    student = new Student('s001', 'John Doe', 'CS');
  });

  it('defaults the major to Undeclared', () => {
    expect(new Student('s002', 'Jane Doe').major).toBe('Undeclared');
  });

  it('rejects empty ids and names', () => {
    expect(() => new Student(' ', 'Jane')).toThrow(InvalidArgumentError);
    expect(() => new Student('s002', '')).toThrow(InvalidArgumentError);
  });

  it('refuses grades for a class the student is not in', () => {
    expect(() => student.addAssignment('INST326', new Homework('HW 1', 5, 10))).toThrow(NotEnrolledError);
    expect(() => student.addAssignment('INST326', new Homework('HW 1', 5, 10))).toThrow(
      'John Doe is not enrolled in INST326'
    );

    student.enroll('INST326');
    student.addAssignment('INST326', new Homework('HW 1', 5, 10));
    expect(student.getAssignments('INST326')).toHaveLength(1);
  });

  it('enrolls idempotently without losing grades', () => {
    student.enroll('INST326');
    student.addAssignment('INST326', new Homework('HW 1', 5, 10));
    student.enroll('INST326');

    expect(student.classes).toEqual(['INST326']);
    expect(student.getAssignments('INST326')).toHaveLength(1);
  });

  it('discards grades when a class is dropped', () => {
    student.enroll('INST326');
    student.addAssignment('INST326', new Homework('HW 1', 5, 10));
    student.drop('INST326');

    expect(student.isEnrolled('INST326')).toBe(false);
    expect(student.getAssignments('INST326')).toEqual([]);

    student.enroll('INST326');
    expect(student.getAssignments('INST326')).toEqual([]);
  });

  it('replaces an assignment added again under the same name', () => {
    student.enroll('INST326');
    student.addAssignment('INST326', new Homework('HW 1', 50, 100));
    student.addAssignment('INST326', new Exam('HW 1', 90, 100));

    const assignments = student.getAssignments('INST326');
    expect(assignments).toHaveLength(1);
    expect(assignments[0].type).toBe('Exam');
    expect(assignments[0].points).toBe(90);
  });

  it('exposes classes as a copy', () => {
    student.enroll('INST326');
    student.classes.push('HACK101');
    expect(student.classes).toEqual(['INST326']);
  });

  it('updates and deletes existing assignments', () => {
    student.enroll('INST326');
    student.addAssignment('INST326', new Homework('HW 1', 5, 10));

    student.updateAssignment('INST326', 'HW 1', 9, 10);
    expect(student.getAssignment('INST326', 'HW 1')?.points).toBe(9);

    student.deleteAssignment('INST326', 'HW 1');
    expect(student.getAssignment('INST326', 'HW 1')).toBeUndefined();
  });

  it('reports missing classes and assignments as NotFound', () => {
    expect(() => student.updateAssignment('MATH', 'HW 1', 1, 2)).toThrow(NotFoundError);
    expect(() => student.updateAssignment('MATH', 'HW 1', 1, 2)).toThrow('No grades found for MATH');

    student.enroll('MATH');
    expect(() => student.deleteAssignment('MATH', 'HW 9')).toThrow("Assignment 'HW 9' not found");
  });

  describe('averages', () => {
    it('averages each variant its own way', () => {
      student.enroll('Math');
      student.addAssignment('Math', new Homework('HW 1', 80, 100));
      student.addAssignment('Math', new Quiz('Quiz 1', 8, 10));
      student.addAssignment('Math', new Project('Proj 1', 90, 100));
      student.addAssignment('Math', new Exam('Exam 1', 85, 100));

      // (80 + 96 + 81 + 85) / 4
      expect(student.getClassAverage('Math')).toBe(85.5);
    });

    it('rounds to two decimals', () => {
      student.enroll('Math');
      student.addAssignment('Math', new Homework('HW 1', 1, 3));
      expect(student.getClassAverage('Math')).toBe(33.33);
    });

    it('averages across every class for the overall figure', () => {
      student.enroll('INST326');
      student.enroll('ENGL101');
      student.addAssignment('INST326', new Homework('HW 1', 100, 100));
      student.addAssignment('ENGL101', new Homework('Essay 1', 50, 100));
      student.addAssignment('ENGL101', new Homework('Essay 2', 0, 100));

      expect(student.getClassAverage('ENGL101')).toBe(25);
      expect(student.getOverallAverage()).toBe(50);
    });

    it('has no value rather than zero when nothing is graded', () => {
      student.enroll('INST326');
      expect(student.getClassAverage('INST326')).toBeNull();
      expect(student.getClassAverage('NOPE')).toBeNull();
      expect(student.getOverallAverage()).toBeNull();

      student.addAssignment('INST326', new Homework('HW 1', 0, 10));
      expect(student.getClassAverage('INST326')).toBe(0);
    });
  });

  describe('records', () => {
    it('round-trips every field', () => {
      student.enroll('INST326');
      student.enroll('ENGL101');
      student.addAssignment('INST326', new Quiz('Quiz 1', 7.5, 10, 2));
      student.addAssignment('INST326', new Project('Capstone', 88, 100, 12));

      const record = student.toRecord();
      expect(record).toEqual({
        student_id: 's001',
        name: 'John Doe',
        major: 'CS',
        classes: ['INST326', 'ENGL101'],
        grades: {
          INST326: {
            'Quiz 1': { type: 'Quiz', name: 'Quiz 1', points: 7.5, max_points: 10, week: 2 },
            Capstone: { type: 'Project', name: 'Capstone', points: 88, max_points: 100, week: 12 },
          },
          ENGL101: {},
        },
      });
      expect(Student.fromRecord(record).toRecord()).toEqual(record);
    });

    it('enrolls classes that only appear in grades', () => {
      const rebuilt = Student.fromRecord({
        student_id: 's009',
        name: 'Kim',
        major: 'Art',
        classes: ['ART100'],
        grades: {
          ART200: { Sketch: { type: 'Homework', name: 'Sketch', points: 4, max_points: 5, week: 1 } },
        },
      });

      expect(rebuilt.classes).toEqual(['ART100', 'ART200']);
      expect(rebuilt.getClassAverage('ART200')).toBe(80);
    });
  });
});
