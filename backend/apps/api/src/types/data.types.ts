import { z } from "zod"
import type { ValidationIssue } from "../utils/errors"

/*
|--------------------------------------------------------------------------
| Data A Contract
|--------------------------------------------------------------------------
| Menu items + VAT rates submitted on POST /data-a. Unknown fields are
| dropped; isDefault is filled in when omitted.
|--------------------------------------------------------------------------
*/

/* ---------------- Menu ---------------- */

export const VAT_RATE_NAMES = ["normal", "reduced", "none"] as const

export const menuItemSchema = z.object({
  id: z.number().int().positive(),
  sysName: z.string(),
  name: z.record(z.string(), z.string()),
  price: z.number().positive().finite(),
  vatRate: z.enum(VAT_RATE_NAMES),
})

/* ---------------- VAT ---------------- */

export const vatRateSchema = z.object({
  ratePct: z.number().positive().finite(),
  isDefault: z.boolean().default(false),
})

/* ---------------- Payload ---------------- */

export const dataASchema = z.object({
  menus: z.array(menuItemSchema),
  vatRates: z.record(z.string(), vatRateSchema),
})

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    loc: ["body", ...issue.path],
    msg: issue.message,
  }))
}

/* ---------------- Responses ---------------- */

export type StatusResponse = { status: "ok" }
export type DetailResponse = { detail: string }
