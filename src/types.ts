export const INTENT_TYPES = [
  "why_rejected",
  "why_approved",
  "similar_cases",
  "risk_analysis",
  "audit_reason",
  "general_inquiry"
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export const COMPLIANCE_TONES = ["audit", "business", "neutral"] as const;

export type ComplianceTone = (typeof COMPLIANCE_TONES)[number];

export type CellValue = string | number | boolean | null;

export type LoanRecord = Readonly<Record<string, CellValue>>;

export interface RangeFilter {
  min?: number;
  max?: number;
}

export type FilterValue = string | number | boolean | RangeFilter;

export type CaseFilters = Record<string, FilterValue>;

export interface KnowledgeEntry {
  id: string;
  questions: readonly string[];
  answer: string;
}

export interface MatchResult {
  entry: KnowledgeEntry;
  confidence: number;
}

export interface IntentResult {
  intent: IntentType;
  loanId: string | null;
  filters: CaseFilters;
  resultCountHint: number;
  tone: ComplianceTone;
  confidence: number;
}

export interface RetrievedCase {
  caseId: string;
  customerName?: string;
  loanAmount?: number;
  approvalStatus?: string;
  similarityScore: number;
  rawRecord: LoanRecord;
}

export type QueryCategory = "MATHEMATICAL" | "SEMANTIC";

export interface RoutingDecision {
  category: QueryCategory;
  synthesizedCode?: string;
  validationPassed: boolean;
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export type ResponseSource = "golden_kb" | "pipeline";

export interface FinalResponse {
  query: string;
  intent: IntentType;
  retrievedCaseCount: number;
  summary: string;
  evidencePoints: string[];
  riskNotes: string[];
  complianceDisclaimer: string;
  structuredData: RetrievedCase[];
  source: ResponseSource;
}

export interface LoanDataset {
  columns: string[];
  records: LoanRecord[];
  embeddings: number[][];
}

export interface QueryHistoryEntry {
  userId: string | null;
  sessionId: string;
  query: string;
  summary: string;
  intent: IntentType;
  source: ResponseSource;
  retrievedCaseCount: number;
  createdAt: Date;
}
