import { QueryFailedError, type EntityManager } from "typeorm";
import { GradeEntity, StudentEntity, type GradeRow } from "@/lib/db/schema";
import type { TranscriptStore } from "@/lib/db/store";
import type { ParsedStudent, ParsedTranscript } from "@/lib/extractors/transcript/types";
import { log, toErrorMessage } from "@/lib/ops/logger";

export type StudentCommit = {
  outcome: "imported" | "alreadyPresent";
  gradesInserted: number;
};

export type FailedStudent = {
  student: string;
  startLine: number;
  cause: string;
};

export type CommitResult = {
  attempted: number;
  imported: number;
  alreadyPresent: number;
  gradesInserted: number;
  failed: FailedStudent[];
};

function constraintCode(e: unknown): string | null {
  if (!(e instanceof QueryFailedError)) return null;
  const driverError: unknown = e.driverError;
  if (typeof driverError !== "object" || driverError === null || !("code" in driverError)) return null;
  return String(driverError.code);
}

/** Unique, check, not-null and foreign-key failures: the student's data is at fault, not the store. */
export function isIntegrityViolation(e: unknown) {
  return constraintCode(e)?.startsWith("SQLITE_CONSTRAINT") ?? false;
}

/**
 * Identity row first (kept as-is when it already exists), then the grades the
 * store does not hold yet for that student. Nothing is ever overwritten.
 */
export async function commitStudent(scope: EntityManager, student: ParsedStudent): Promise<StudentCommit> {
  const r = student.record;
  const identity = {
    familyName: r.familyName,
    givenName: r.givenName,
    track: r.track,
    academicYear: r.academicYear,
    semester: r.semester,
  };

  const existing = await scope.findOneBy(StudentEntity, identity);
  if (!existing) {
    await scope.insert(StudentEntity, { ...identity, studentNumber: r.studentNumber });
  }
  const row = existing ?? (await scope.findOneByOrFail(StudentEntity, identity));

  const stored = await scope.find(GradeEntity, { where: { studentId: row.id }, select: { courseName: true } });
  const seen = new Set(stored.map((g) => g.courseName));
  const fresh: Array<Omit<GradeRow, "id" | "student">> = [];
  for (const g of student.grades) {
    if (seen.has(g.courseName)) continue;
    seen.add(g.courseName);
    fresh.push({ studentId: row.id, unitCode: g.unitCode, courseName: g.courseName, score: g.score, isUnit: g.isUnit });
  }
  if (fresh.length) await scope.insert(GradeEntity, fresh);

  return { outcome: existing ? "alreadyPresent" : "imported", gradesInserted: fresh.length };
}

/**
 * One outer transaction for the document, one savepoint per student.
 * A constraint failure rolls back that student alone; any other error aborts the whole batch.
 */
export async function commitTranscript(store: TranscriptStore, parsed: ParsedTranscript): Promise<CommitResult> {
  const result: CommitResult = {
    attempted: parsed.students.length,
    imported: 0,
    alreadyPresent: 0,
    gradesInserted: 0,
    failed: [],
  };

  await store.dataSource.transaction(async (batch) => {
    for (const student of parsed.students) {
      const label = `${student.record.familyName} ${student.record.givenName}`;
      try {
        const commit = await batch.transaction((scope) => commitStudent(scope, student));
        if (commit.outcome === "imported") result.imported += 1;
        else result.alreadyPresent += 1;
        result.gradesInserted += commit.gradesInserted;
      } catch (e) {
        if (!isIntegrityViolation(e)) throw e;
        const cause = toErrorMessage(e);
        result.failed.push({ student: label, startLine: student.startLine, cause });
        log.warn("student_rolled_back", {
          source: parsed.source,
          student: label,
          studentNumber: student.record.studentNumber,
          line: student.startLine,
          constraint: constraintCode(e),
          cause,
        });
      }
    }
  });

  return result;
}
