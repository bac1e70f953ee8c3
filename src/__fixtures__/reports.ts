/**
 * Report fixtures shared by the detection, transformation, batch and CLI suites
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

export const CREDIT_CARD_CSV = [
  "Trans. #,Trans. Date,Settle Date,Gross Amt,Disc. Fee,Per Trans. Fee,Net Amt,Acct Type,Acct Details,Trans. Type,Payer Name,Client Name,Provider",
  "9690,01-04-2025,01-06-2025,55,1.65,0.10,53.25,Visa,XXXX1111,Sale,Kate Martin,Kate Martin,Tammy Maxey",
  "9691,01-05-2025,01-07-2025,120.50,3.62,0.10,116.78,MasterCard,XXXX2222,Sale,Sam Placeholder,Sam Placeholder,Tammy Maxey",
  "",
].join("\n");

export const INSURANCE_CSV = [
  "RowId,Check Date,Payment From,Check Amount,Cash Applied,Provider",
  "1,01/15/2025,Acme Health,100.00,80.00,Dr. Placeholder",
  "2,01/16/2025,Acme Health,250.00,,Dr. Placeholder",
  "",
].join("\n");

export const CONTINUATION_CSV = [
  "Check Date,Date Posted,Check Number,Payment From,Reference,Check Amount,Cash Applied,Provider",
  "01/10/2025,01/12/2025,5001,Acme Health,REF-1,300.00,100.00,Dr. Placeholder",
  ",,,,REF-2,,200.00,",
  "",
].join("\n");

export const GENERIC_CSV = [
  "Column1,Column2,Column3,Column4",
  "1,alpha,10.5,x",
  "2,beta,20.25,y",
  "",
].join("\n");

export const HEADERLESS_CSV = ["1,2,3", "4,5,6", "7,8,9", ""].join("\n");

export function createTempDir(prefix: string = "report-normalizer-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(directory: string): void {
  rmSync(directory, { recursive: true, force: true });
}

export function writeFixture(directory: string, name: string, content: string): string {
  const filePath = join(directory, name);
  writeFileSync(filePath, content, "utf8");
  return filePath;
}
