import { z } from "zod";

/*
 * Wire shapes of the three Eastmoney payloads. Only the columns we read are
 * declared; zod strips the rest. A mismatch here becomes UpstreamSchemaError.
 */

const rawNumeric = z.union([z.number(), z.string(), z.null()]);

/* ---------- push2 clist: exchange quotes for the LOF boards ---------- */

export const ClistItemSchema = z.object({
  f12: z.string().min(1),          // code
  f14: z.string(),                 // name
  f2: rawNumeric,                  // latest price
  f6: rawNumeric,                  // traded value
  f8: rawNumeric,                  // turnover rate
  f18: rawNumeric,                 // prior close
});

export const ClistResponseSchema = z.object({
  data: z
    .object({
      total: z.number().int().min(0),
      diff: z.array(ClistItemSchema),
    })
    .nullable(),
});

export type ClistItem = z.infer<typeof ClistItemSchema>;
export type ClistResponse = z.infer<typeof ClistResponseSchema>;

/* ---------- FundGuZhi: intraday valuation estimates ---------- */

export const ValuationItemSchema = z.object({
  bzdm: z.string().min(1),         // code
  gsz: rawNumeric,                 // estimated unit value
});

export const ValuationResponseSchema = z.object({
  Data: z.object({
    list: z.array(ValuationItemSchema),
  }),
});

export type ValuationItem = z.infer<typeof ValuationItemSchema>;

/* ---------- Fund_JJJZ_Data: purchase/redemption status table ---------- */

const cell = z.union([z.string(), z.number(), z.null()]);

/**
 * Positional row:
 *   0 code, 1 name, 2 type, 3 nav, 4 nav date, 5 subscription status,
 *   6 redemption status, 7 next open day, 8 min purchase, 9 daily limit,
 *   10-11 unused, 12 fee
 */
export const StatusTupleSchema = z.array(cell).min(10);

export const StatusTableSchema = z.array(StatusTupleSchema);

export type StatusTuple = z.infer<typeof StatusTupleSchema>;
