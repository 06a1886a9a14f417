import { z } from "zod";

/**
 * The only part of an MTB file the bridge reads. Everything else is
 * forwarded untouched.
 */
export const MtbFileConsentSchema = z.object({
  consent: z.object({
    patient: z.string().min(1),
    status: z.enum(["active", "rejected"]),
  }),
});

export type ConsentStatus = z.infer<
  typeof MtbFileConsentSchema
>["consent"]["status"];

export interface MtbFileConsent {
  patientId: string;
  status: ConsentStatus;
}

/** HTTP call that carries one MTB file to the backend. */
export interface BackendRequest {
  method: "POST" | "DELETE";
  /** Path relative to the backend base URI. */
  path: string;
  body?: Buffer;
}

/** Read the consent block of an MTB file. Returns `null` for anything else. */
export function readConsent(payload: Buffer | null): MtbFileConsent | null {
  if (!payload || payload.length === 0) return null;
  let json: unknown;
  try {
    json = JSON.parse(payload.toString("utf8"));
  } catch {
    return null;
  }
  const parsed = MtbFileConsentSchema.safeParse(json);
  if (!parsed.success) return null;
  return {
    patientId: parsed.data.consent.patient,
    status: parsed.data.consent.status,
  };
}

/**
 * Pick the backend call for a payload.
 *
 * A file whose consent was rejected asks the backend to delete the patient's
 * data. Everything else, including payloads that are not MTB files at all,
 * is posted as-is.
 */
export function routeRequest(payload: Buffer | null): BackendRequest {
  const consent = readConsent(payload);
  if (consent?.status === "rejected") {
    return {
      method: "DELETE",
      path: `/MTBFile/${encodeURIComponent(consent.patientId)}`,
    };
  }
  return { method: "POST", path: "/MTBFile", body: payload ?? undefined };
}
