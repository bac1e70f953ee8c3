/**
 * @fileoverview Built-in transformation pipelines, keyed by format name
 */

import {
  AddConstantRule,
  DateFormatRule,
  ForwardFillRule,
  MergeColumnsRule,
  NumberFormatRule,
  RenameColumnsRule,
  type TransformationRule,
} from "./rules";

export type TransformationPipeline = readonly TransformationRule[];

const creditCardPayment = (): TransformationPipeline => [
  new RenameColumnsRule({
    "Trans. #": "transaction_id",
    "Trans. Date": "transaction_date",
    "Gross Amt": "cash_applied",
    "Acct Type": "payment_type",
    "Client Name": "patient_id",
    Provider: "provider_name",
  }),
  new DateFormatRule(["transaction_date"]),
  new NumberFormatRule(["cash_applied"]),
  new AddConstantRule("payment_type", "credit_card"),
];

const insuranceClaims = (): TransformationPipeline => [
  new RenameColumnsRule({
    RowId: "transaction_id",
    "Check Date": "transaction_date",
    "Check Amount": "insurance_payment",
    "Cash Applied": "cash_applied",
    "Payment From": "payer_name",
    Provider: "provider_name",
  }),
  new DateFormatRule(["transaction_date"]),
  new NumberFormatRule(["cash_applied", "insurance_payment"]),
  // Cash applied wins; the check amount covers rows that left it blank
  new MergeColumnsRule(["cash_applied", "insurance_payment"], "cash_applied"),
  new AddConstantRule("payment_type", "insurance"),
];

/**
 * Payment exports where one check spans several rows and only the first
 * row carries the check details
 */
const paymentsContinuation = (): TransformationPipeline => [
  new RenameColumnsRule({
    "Check Date": "transaction_date",
    "Date Posted": "posted_date",
    "Check Number": "check_number",
    "Payment From": "payer_name",
    Reference: "reference",
    "Check Amount": "check_amount",
    "Cash Applied": "cash_applied",
    Provider: "provider_name",
  }),
  new DateFormatRule(["transaction_date", "posted_date"]),
  new NumberFormatRule(["check_amount", "cash_applied"]),
  new ForwardFillRule([
    "transaction_date",
    "posted_date",
    "check_number",
    "payer_name",
    "provider_name",
    "check_amount",
  ]),
  new MergeColumnsRule(["cash_applied", "check_amount"], "cash_applied"),
  new AddConstantRule("payment_type", "insurance"),
];

export function createDefaultPipelines(): Map<string, TransformationPipeline> {
  return new Map<string, TransformationPipeline>([
    ["credit_card_payment", creditCardPayment()],
    ["insurance_claims", insuranceClaims()],
    ["payments_continuation", paymentsContinuation()],
  ]);
}
