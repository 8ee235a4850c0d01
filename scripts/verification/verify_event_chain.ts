/**
 * Event Chain Verification
 *
 * Offline check of a journal export (the body of GET /events, or a bare JSON
 * array of records). Exits non-zero when a hash link is broken.
 *
 * Usage: tsx scripts/verification/verify_event_chain.ts <export.json>
 */

import fs from "fs";
import { z } from "zod";
import { verifyEventChain } from "../../libs/events/integrity.js";
import { validate } from "../../libs/validation/zod-middleware.js";

const ExportedRecordSchema = z.object({
    sequence: z.number().int().nonnegative(),
    eventType: z.string().min(1),
    timestamp: z.number().int().nonnegative(),
    payload: z.record(z.string(), z.unknown()),
    integrity: z.object({
        prevHash: z.string().regex(/^[0-9a-f]{64}$/),
        hash: z.string().regex(/^[0-9a-f]{64}$/),
    }),
});

const ExportSchema = z.union([
    z.array(ExportedRecordSchema),
    z.object({ events: z.array(ExportedRecordSchema) }).transform((body) => body.events),
]);

function verifyExport(exportPath: string) {
    if (!fs.existsSync(exportPath)) {
        console.error("No export found at " + exportPath);
        process.exit(1);
    }

    const raw: unknown = JSON.parse(fs.readFileSync(exportPath, "utf8"));
    const records = validate(ExportSchema, raw, "VerifyEventChain");
    const result = verifyEventChain(records);

    if (!result.valid) {
        console.error("--- Event chain INVALID ---");
        console.error(result.reason);
        process.exit(2);
    }

    const last = records[records.length - 1];
    console.log("--- Event chain valid ---");
    console.log("Records verified: " + records.length);
    console.log("Head hash: " + (last ? last.integrity.hash : "(empty)"));
}

const target = process.argv[2];
if (!target) {
    console.error("Usage: verify_event_chain.ts <export.json>");
    process.exit(1);
}
verifyExport(target);
