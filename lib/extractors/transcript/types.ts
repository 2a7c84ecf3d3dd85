export type ParcoursInfo = {
  track: string;
  academicYear: string;
  semester: string;
};

export type ParcoursField = keyof ParcoursInfo;

export type StudentRecord = ParcoursInfo & {
  familyName: string;
  givenName: string;
  studentNumber: string;
};

export type GradeEntry = {
  unitCode: string;
  courseName: string;
  score: number;
  isUnit: boolean;
};

export type RawStudentBlock = {
  index: number;
  /** 1-based line of the name line in the source document. */
  startLine: number;
  text: string;
};

export type StudentFields = {
  familyName: string;
  givenName: string;
  studentNumber: string;
  ine: string | null;
  notesText: string;
};

export type StudentFieldsOutcome =
  | ({ status: "parsed" } & StudentFields)
  | { status: "skipped"; label: string; cause: string };

export type ParsedStudent = {
  record: StudentRecord;
  grades: GradeEntry[];
  blockIndex: number;
  startLine: number;
  warnings: string[];
};

export type SkippedStudent = {
  blockIndex: number;
  startLine: number;
  label: string;
  cause: string;
};

export type ParcoursResult = {
  parcours: ParcoursInfo;
  defaultedFields: ParcoursField[];
  warnings: string[];
};

export type SegmentedDocument = ParcoursResult & {
  blocks: RawStudentBlock[];
};

export type ParsedTranscript = ParcoursResult & {
  source: string;
  students: ParsedStudent[];
  skipped: SkippedStudent[];
};

export type GradeTreeResult = {
  grades: GradeEntry[];
  warnings: string[];
};

export type TranscriptParseOptions = {
  source: string;
  pageHeaderMarker: string;
  placeholders: ParcoursInfo;
  strictHeader: boolean;
};
