/**
 * Dashboards — Per-user summaries for the logged-in student or teacher
 */
import type { Gradebook } from '../models/gradebook.js';
import { roundScore } from '../models/student.js';

export interface AssignmentSummary {
  name: string;
  type: string;
  points: number;
  maxPoints: number;
  percentage: number;
  week: number;
}

export interface StudentDashboard {
  studentId: string;
  name: string;
  major: string;
  overallAverage: number | null;
  classes: {
    className: string;
    average: number | null;
    assignments: AssignmentSummary[];
  }[];
}

export interface TeacherDashboard {
  teacherId: string;
  name: string;
  department: string;
  courses: {
    courseCode: string;
    classAverage: number | null;
    enrolled: number;
    students: { studentId: string; name: string; average: number | null }[];
  }[];
}

export function buildStudentDashboard(gradebook: Gradebook, studentId: string): StudentDashboard | null {
  const student = gradebook.getStudent(studentId);
  if (!student) return null;

  return {
    studentId: student.studentId,
    name: student.name,
    major: student.major,
    overallAverage: student.getOverallAverage(),
    classes: student.classes.map(className => ({
      className,
      average: student.getClassAverage(className),
      assignments: student.getAssignments(className).map(a => ({
        name: a.name,
        type: a.type,
        points: a.points,
        maxPoints: a.maxPoints,
        percentage: roundScore(a.calculatePercentage()),
        week: a.week,
      })),
    })),
  };
}

export function buildTeacherDashboard(gradebook: Gradebook, teacherId: string): TeacherDashboard | null {
  const teacher = gradebook.getTeacher(teacherId);
  if (!teacher) return null;

  return {
    teacherId: teacher.teacherId,
    name: teacher.name,
    department: teacher.department,
    courses: teacher.coursesTaught.map(courseCode => {
      const roster = gradebook.getClassRoster(courseCode);
      return {
        courseCode,
        classAverage: gradebook.getClassAverage(courseCode),
        enrolled: roster.length,
        students: roster.map(s => ({
          studentId: s.studentId,
          name: s.name,
          average: s.getClassAverage(courseCode),
        })),
      };
    }),
  };
}
