import { EntitySchema } from "typeorm";

export type StudentRow = {
  id: number;
  familyName: string;
  givenName: string;
  studentNumber: string | null;
  track: string;
  academicYear: string;
  semester: string;
  grades?: GradeRow[];
};

export type GradeRow = {
  id: number;
  studentId: number;
  unitCode: string;
  courseName: string;
  score: number;
  isUnit: boolean;
  student?: StudentRow;
};

export const StudentEntity = new EntitySchema<StudentRow>({
  name: "Student",
  tableName: "students",
  columns: {
    id: { type: "integer", primary: true, generated: "increment" },
    familyName: { type: "text", name: "family_name" },
    givenName: { type: "text", name: "given_name" },
    studentNumber: { type: "text", name: "student_number", nullable: true },
    track: { type: "text" },
    academicYear: { type: "text", name: "academic_year" },
    semester: { type: "text" },
  },
  uniques: [
    {
      name: "uq_students_identity",
      columns: ["familyName", "givenName", "track", "academicYear", "semester"],
    },
  ],
  relations: {
    grades: { type: "one-to-many", target: "Grade", inverseSide: "student" },
  },
});

export const GradeEntity = new EntitySchema<GradeRow>({
  name: "Grade",
  tableName: "grades",
  columns: {
    id: { type: "integer", primary: true, generated: "increment" },
    studentId: { type: "integer", name: "student_id" },
    unitCode: { type: "text", name: "unit_code" },
    courseName: { type: "text", name: "course_name" },
    score: { type: "real" },
    isUnit: { type: "boolean", name: "is_unit", default: false },
  },
  uniques: [{ name: "uq_grades_student_course", columns: ["studentId", "courseName"] }],
  checks: [{ name: "ck_grades_score_range", expression: `"score" >= 0 AND "score" <= 20` }],
  relations: {
    student: {
      type: "many-to-one",
      target: "Student",
      inverseSide: "grades",
      joinColumn: { name: "student_id" },
      onDelete: "CASCADE",
    },
  },
});

export const entities = [StudentEntity, GradeEntity];
