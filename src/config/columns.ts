/**
 * Column names of the loan application dataset. Every component reads
 * records through these names so a re-labelled export only needs a change here.
 */
export const LOAN_COLUMNS = {
  id: "Loan_ID",
  customerName: "Customer_Name",
  status: "Loan_Status",
  amount: "Loan_Amount",
  income: "Applicant_Income",
  creditScore: "CIBIL_Score",
  debtRatio: "Debt_to_Income_Ratio",
  purpose: "Purpose_of_Loan",
  employment: "Employment_Type",
  age: "Age"
} as const;

export const FILTER_ALIASES: Record<string, string> = {
  id: LOAN_COLUMNS.id,
  loan_id: LOAN_COLUMNS.id,
  customer: LOAN_COLUMNS.customerName,
  customer_name: LOAN_COLUMNS.customerName,
  status: LOAN_COLUMNS.status,
  loan_status: LOAN_COLUMNS.status,
  amount: LOAN_COLUMNS.amount,
  loan_amount: LOAN_COLUMNS.amount,
  income: LOAN_COLUMNS.income,
  applicant_income: LOAN_COLUMNS.income,
  credit_score: LOAN_COLUMNS.creditScore,
  cibil_score: LOAN_COLUMNS.creditScore,
  debt_ratio: LOAN_COLUMNS.debtRatio,
  dti: LOAN_COLUMNS.debtRatio,
  purpose: LOAN_COLUMNS.purpose,
  loan_purpose: LOAN_COLUMNS.purpose,
  employment: LOAN_COLUMNS.employment,
  employment_type: LOAN_COLUMNS.employment,
  age: LOAN_COLUMNS.age
};

/** Column holding the precomputed vector, never shown to the model. */
export const EMBEDDING_COLUMN = "embeddings";
