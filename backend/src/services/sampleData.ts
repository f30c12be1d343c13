import { Exam, Homework, Project, Quiz, type Assignment } from '../models/assignment.js';
import { Gradebook } from '../models/gradebook.js';
import { Student } from '../models/student.js';
import { Teacher } from '../models/teacher.js';

/** Builds the demo gradebook used when no saved snapshot exists. */
export function createSampleGradebook(): Gradebook {
  const gradebook = new Gradebook();

  for (const [id, name, department] of [
    ['t001', 'Dr. Amanda Johnson', 'Information Science'],
    ['t002', 'Prof. Brian Smith', 'Computer Science'],
  ]) {
    const teacher = new Teacher(id, name, department);
    teacher.addCourse('INST326');
    gradebook.addTeacher(teacher);
  }

  const students: [string, string, string, string[]][] = [
    ['s001', 'John Kirk', 'Information Science', ['INST326', 'ENGL101']],
    ['s002', 'Sarah Williams', 'Computer Science', ['INST326', 'CMSC131']],
    ['s003', 'Maria Rodriguez', 'Business', ['INST326', 'BMGT110']],
  ];
  for (const [id, name, major, classes] of students) {
    const student = new Student(id, name, major);
    classes.forEach(className => student.enroll(className));
    gradebook.addStudent(student);
  }

  const grades: [string, Assignment][] = [
    ['s001', new Homework('Lab 1', 18, 20, 1)],
    ['s001', new Quiz('Quiz 1', 9, 10, 2)],
    ['s001', new Exam('Midterm', 85, 100, 8)],
    ['s002', new Homework('Lab 1', 20, 20, 1)],
    ['s002', new Quiz('Quiz 1', 8, 10, 2)],
    ['s002', new Project('Project 1', 92, 100, 5)],
    ['s003', new Homework('Lab 1', 17, 20, 1)],
    ['s003', new Quiz('Quiz 1', 7, 10, 2)],
  ];
  for (const [studentId, assignment] of grades) {
    gradebook.addGrade(studentId, 'INST326', assignment);
  }

  return gradebook;
}
