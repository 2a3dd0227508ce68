import { PromptTemplate } from "@langchain/core/prompts";
import type { ComplianceTone, IntentType } from "../types";

export const JSON_SYSTEM_PROMPT = "You are a helpful assistant that outputs JSON only.";

const intentTemplate = new PromptTemplate<{ query: string }>({
  inputVariables: ["query"],
  template: [
    "You analyse questions asked by loan officers and auditors about a dataset of loan applications.",
    "Classify the question and extract retrieval hints. Respond with a single JSON object:",
    "{{",
    '  "intent": "why_rejected" | "why_approved" | "similar_cases" | "risk_analysis" | "audit_reason" | "general_inquiry",',
    '  "loan_id": "string or null",',
    '  "filters": {{ "<column or alias>": "value" | number | {{ "min": number, "max": number }} }},',
    '  "top_k_hint": integer between 1 and 50 (how many similar cases are worth reading, default 5),',
    '  "compliance_tone": "audit" | "business" | "neutral",',
    '  "confidence_score": number between 0 and 1',
    "}}",
    "",
    "Filter aliases: status, amount, income, credit_score, debt_ratio, purpose, employment, age.",
    "Use the audit tone when the user mentions audits, regulators or compliance review.",
    "",
    "Question: {query}"
  ].join("\n")
});

const routingTemplate = new PromptTemplate<{ query: string }>({
  inputVariables: ["query"],
  template: [
    "Classify this query as either MATHEMATICAL or SEMANTIC.",
    "",
    "MATHEMATICAL queries require:",
    "- Calculations (average, sum, count, percentage, ratio)",
    "- Aggregations (how many, total, top N)",
    "- Filtering with numeric conditions",
    "- Statistical operations",
    "",
    "SEMANTIC queries require:",
    "- Understanding context and patterns",
    "- Analyzing reasons and causes",
    "- Comparing similar cases",
    "- Explaining trends or factors",
    "- Finding related records",
    "",
    "Query: {query}",
    "",
    "Classification (respond with only one word - either MATHEMATICAL or SEMANTIC):"
  ].join("\n")
});

const codeTemplate = new PromptTemplate<{ schema: string; query: string }>({
  inputVariables: ["schema", "query"],
  template: [
    "Generate a short JavaScript snippet that answers this query about loan data.",
    "",
    "Dataset schema:",
    "{schema}",
    "",
    "User Query: {query}",
    "",
    "Requirements:",
    "1. The data is an array of row objects bound to the variable `df` (one object per loan application).",
    "2. Store the final answer in a variable called `result`.",
    "3. Use only array methods (filter, map, reduce, sort, slice, some, every, find), arithmetic and these helpers:",
    "   len, sum, mean, median, round, range, zip, column(rows, name), countBy(rows, name), Math, Number, String, Object.keys/values/entries.",
    "4. No imports, no require, no classes, no while loops, no network or file access.",
    "5. Skip missing values (null) before averaging.",
    "6. For percentages, multiply by 100. For currency, keep the number (formatting is done separately).",
    "",
    "Examples:",
    "",
    'Query: "What is the average income?"',
    "Code:",
    'result = mean(column(df, "Applicant_Income"))',
    "",
    'Query: "How many loans were approved?"',
    "Code:",
    'result = df.filter((row) => row.Loan_Status === "Approved").length',
    "",
    'Query: "What percentage of loans were rejected?"',
    "Code:",
    'const rejected = df.filter((row) => row.Loan_Status === "Rejected").length',
    "result = (rejected / len(df)) * 100",
    "",
    'Query: "Top 5 highest loan amounts"',
    "Code:",
    "result = df.slice().sort((a, b) => b.Loan_Amount - a.Loan_Amount).slice(0, 5)",
    "",
    "Now generate code for the user query. Output ONLY the JavaScript code, no explanations or markdown formatting:"
  ].join("\n")
});

const semanticTemplate = new PromptTemplate<{ query: string; context: string }>({
  inputVariables: ["query", "context"],
  template: [
    "You are a loan data analyst. Based on the retrieved loan records, provide a detailed analysis answering the user's query.",
    "",
    "USER QUERY: {query}",
    "",
    "RETRIEVED LOAN RECORDS:",
    "{context}",
    "",
    "INSTRUCTIONS:",
    "1. Analyze patterns in the retrieved records",
    "2. Identify key factors (income, credit score, DTI ratio, etc.)",
    "3. Calculate relevant statistics (averages, counts, percentages)",
    "4. Provide insights and conclusions",
    "5. Be specific with numbers and percentages",
    "6. Only use facts present in the records above",
    "",
    "ANALYSIS:"
  ].join("\n")
});

const explanationTemplate = new PromptTemplate<{
  question: string;
  intent: string;
  toneInstruction: string;
  computed: string;
  context: string;
}>({
  inputVariables: ["question", "intent", "toneInstruction", "computed", "context"],
  template: [
    "You explain loan decisions using only the evidence provided.",
    "{toneInstruction}",
    "",
    "Detected intent: {intent}",
    "Computed figure from the full dataset: {computed}",
    "",
    "{question}",
    "",
    "Evidence (most similar records first):",
    "{context}",
    "",
    "Respond with a single JSON object:",
    "{{",
    '  "summary": "2-4 sentences answering the question",',
    '  "evidence_points": ["one sentence per supporting record, cite the record number"],',
    '  "risk_notes": ["risk factors visible in the evidence, empty if none"]',
    "}}"
  ].join("\n")
});

export const TONE_INSTRUCTIONS: Record<ComplianceTone, string> = {
  audit: "Write for an auditor: formal, factual, every claim traceable to a record.",
  business: "Write for a business stakeholder: concise and outcome focused.",
  neutral: "Write in a clear, neutral tone for a loan officer."
};

export function buildIntentPrompt(query: string): Promise<string> {
  return intentTemplate.format({ query });
}

export function buildRoutingPrompt(query: string): Promise<string> {
  return routingTemplate.format({ query });
}

export function buildCodePrompt(query: string, schema: string): Promise<string> {
  return codeTemplate.format({ query, schema });
}

export function buildSemanticPrompt(query: string, context: string): Promise<string> {
  return semanticTemplate.format({ query, context });
}

export function buildExplanationPrompt(input: {
  question: string;
  intent: IntentType;
  tone: ComplianceTone;
  computed: string | null;
  context: string;
}): Promise<string> {
  return explanationTemplate.format({
    question: input.question,
    intent: input.intent,
    toneInstruction: TONE_INSTRUCTIONS[input.tone],
    computed: input.computed ?? "none",
    context: input.context
  });
}
