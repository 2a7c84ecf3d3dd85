import type { EntityManager } from "typeorm";
import { z } from "zod";
import type { ParcoursInfo } from "@/lib/extractors/transcript/types";
import { appendOpsEvent } from "@/lib/ops/eventLog";
import { log } from "@/lib/ops/logger";
import { readTranscriptConfig, type TranscriptConfig } from "@/lib/transcripts/config";
import type { TranscriptStore } from "./store";

export type TermFilters = {
  academicYear?: string | null;
  track?: string | null;
  semester?: string | null;
};

export type GradeFilters = TermFilters & {
  /** Restricts to grades of this unit; for term dimensions, to students holding it. */
  unitCode?: string | null;
};

export type DistinctDimension = "year" | "track" | "semester" | "unit" | "course";

const TERM_COLUMNS = { year: "academic_year", track: "track", semester: "semester" } as const;

const sqlBoolean = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

const studentRowSchema = z.object({
  id: z.number().int(),
  familyName: z.string(),
  givenName: z.string(),
  studentNumber: z.string().nullable(),
  track: z.string(),
  academicYear: z.string(),
  semester: z.string(),
});

const transcriptRowSchema = z.object({
  studentId: z.number().int(),
  familyName: z.string(),
  givenName: z.string(),
  studentNumber: z.string().nullable(),
  track: z.string(),
  academicYear: z.string(),
  semester: z.string(),
  unitCode: z.string(),
  courseName: z.string(),
  score: z.number(),
  isUnit: sqlBoolean,
});

const valueRowsSchema = z.array(z.object({ value: z.union([z.string(), z.number()]).transform(String) }));
const countRowsSchema = z.array(z.object({ count: z.number().int() }));

export type StoredStudent = z.infer<typeof studentRowSchema>;
export type TranscriptRow = z.infer<typeof transcriptRowSchema>;

type Where = { clauses: string[]; params: string[] };

function termWhere(filters: TermFilters, prefix: string): Where {
  const clauses: string[] = [];
  const params: string[] = [];
  if (filters.academicYear) {
    clauses.push(`${prefix}academic_year = ?`);
    params.push(filters.academicYear);
  }
  if (filters.track) {
    clauses.push(`${prefix}track = ?`);
    params.push(filters.track);
  }
  if (filters.semester) {
    clauses.push(`${prefix}semester = ?`);
    params.push(filters.semester);
  }
  return { clauses, params };
}

function whereSql(clauses: string[]) {
  return clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
}

const JOINED_COLUMNS = `
  s.id AS "studentId",
  s.family_name AS "familyName",
  s.given_name AS "givenName",
  s.student_number AS "studentNumber",
  s.track AS "track",
  s.academic_year AS "academicYear",
  s.semester AS "semester",
  g.unit_code AS "unitCode",
  g.course_name AS "courseName",
  g.score AS "score",
  g.is_unit AS "isUnit"`;

async function queryJoined(manager: EntityManager, where: Where): Promise<TranscriptRow[]> {
  const rows: unknown = await manager.query(
    `SELECT ${JOINED_COLUMNS}
     FROM students s
     JOIN grades g ON g.student_id = s.id${whereSql(where.clauses)}
     ORDER BY s.id, g.id`,
    where.params
  );
  return z.array(transcriptRowSchema).parse(rows);
}

/** Distinct values of one dimension, ascending, narrowed by any filters given. */
export async function listDistinct(
  store: TranscriptStore,
  dimension: DistinctDimension,
  filters: GradeFilters = {}
): Promise<string[]> {
  const where = termWhere(filters, "s.");
  let sql: string;

  if (dimension === "unit" || dimension === "course") {
    const column = dimension === "unit" ? "unit_code" : "course_name";
    where.clauses.unshift(dimension === "unit" ? "g.is_unit = 1" : "g.is_unit = 0");
    if (filters.unitCode) {
      where.clauses.push("g.unit_code = ?");
      where.params.push(filters.unitCode);
    }
    sql = `SELECT DISTINCT g.${column} AS value FROM grades g JOIN students s ON s.id = g.student_id`;
  } else {
    if (filters.unitCode) {
      where.clauses.push("EXISTS (SELECT 1 FROM grades g WHERE g.student_id = s.id AND g.unit_code = ?)");
      where.params.push(filters.unitCode);
    }
    sql = `SELECT DISTINCT s.${TERM_COLUMNS[dimension]} AS value FROM students s`;
  }

  const rows: unknown = await store.dataSource.query(`${sql}${whereSql(where.clauses)} ORDER BY value`, where.params);
  return valueRowsSchema.parse(rows).map((r) => r.value);
}

export async function listStudents(store: TranscriptStore, filters: TermFilters = {}): Promise<StoredStudent[]> {
  const where = termWhere(filters, "");
  const rows: unknown = await store.dataSource.query(
    `SELECT id,
            family_name AS "familyName",
            given_name AS "givenName",
            student_number AS "studentNumber",
            track,
            academic_year AS "academicYear",
            semester
     FROM students${whereSql(where.clauses)}
     ORDER BY family_name, given_name`,
    where.params
  );
  return z.array(studentRowSchema).parse(rows);
}

export async function countStudentsForTerm(manager: EntityManager, parcours: ParcoursInfo): Promise<number> {
  const where = termWhere(parcours, "");
  const rows: unknown = await manager.query(
    `SELECT COUNT(*) AS count FROM students${whereSql(where.clauses)}`,
    where.params
  );
  return countRowsSchema.parse(rows)[0]?.count ?? 0;
}

/** Grade rows of one student, in the order they were imported (units before their courses). */
export async function getStudentGrades(
  store: TranscriptStore,
  familyName: string,
  givenName: string,
  filters: TermFilters = {}
): Promise<TranscriptRow[]> {
  const where = termWhere(filters, "s.");
  where.clauses.unshift("s.family_name = ?", "s.given_name = ?");
  where.params.unshift(familyName, givenName);
  const rows = await queryJoined(store.dataSource.manager, where);
  log.info("student_grades_read", { student: `${familyName} ${givenName}`, rows: rows.length });
  return rows;
}

export async function exportAll(store: TranscriptStore, filters: TermFilters = {}): Promise<TranscriptRow[]> {
  const rows = await queryJoined(store.dataSource.manager, termWhere(filters, "s."));
  log.info("transcript_rows_exported", { rows: rows.length, filters });
  return rows;
}

/**
 * Removes the students matching every given filter, together with their grades.
 * An empty filter set deletes nothing.
 */
export async function deleteWhere(
  store: TranscriptStore,
  filters: TermFilters,
  options: Partial<TranscriptConfig> = {}
): Promise<number> {
  const where = termWhere(filters, "");
  if (!where.clauses.length) {
    log.warn("delete_without_filters", { filters });
    return 0;
  }

  const matching = `SELECT id FROM students${whereSql(where.clauses)}`;
  const deleted = await store.dataSource.transaction(async (tx) => {
    const students = countRowsSchema.parse(await tx.query(`SELECT COUNT(*) AS count FROM (${matching})`, where.params));
    const grades = countRowsSchema.parse(
      await tx.query(`SELECT COUNT(*) AS count FROM grades WHERE student_id IN (${matching})`, where.params)
    );
    const studentCount = students[0]?.count ?? 0;
    if (!studentCount) return { students: 0, grades: 0 };

    await tx.query(`DELETE FROM grades WHERE student_id IN (${matching})`, where.params);
    await tx.query(`DELETE FROM students${whereSql(where.clauses)}`, where.params);
    return { students: studentCount, grades: grades[0]?.count ?? 0 };
  });

  log.info("students_deleted", { filters, ...deleted });
  if (deleted.students) {
    const { config } = readTranscriptConfig(options);
    await appendOpsEvent(config.opsLogPath, { type: "STUDENTS_DELETED", details: { filters, ...deleted } });
  }
  return deleted.students;
}
