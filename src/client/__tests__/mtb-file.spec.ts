import { readConsent, routeRequest } from "../backend/mtb-file";

const rejected = Buffer.from(
  JSON.stringify({
    patient: { id: "p-1" },
    consent: { id: "c-1", patient: "p-1", status: "rejected" },
  }),
);

describe("readConsent", () => {
  it("reads the consent block of an MTB file", () => {
    expect(readConsent(rejected)).toEqual({
      patientId: "p-1",
      status: "rejected",
    });
  });

  it("returns null for payloads that are not MTB files", () => {
    expect(readConsent(null)).toBeNull();
    expect(readConsent(Buffer.alloc(0))).toBeNull();
    expect(readConsent(Buffer.from("<xml/>"))).toBeNull();
    expect(readConsent(Buffer.from('{"consent":{"status":"unknown"}}'))).toBeNull();
  });
});

describe("routeRequest", () => {
  it("posts files with active consent as they are", () => {
    const payload = Buffer.from(
      '{"consent":{"patient":"p-2","status":"active"}}',
    );

    expect(routeRequest(payload)).toEqual({
      method: "POST",
      path: "/MTBFile",
      body: payload,
    });
  });

  it("deletes the patient when consent was rejected", () => {
    expect(routeRequest(rejected)).toEqual({
      method: "DELETE",
      path: "/MTBFile/p-1",
    });
  });

  it("posts anything unreadable verbatim", () => {
    const payload = Buffer.from("not json");

    expect(routeRequest(payload)).toEqual({
      method: "POST",
      path: "/MTBFile",
      body: payload,
    });
  });

  it("posts without a body when there is no payload", () => {
    expect(routeRequest(null)).toEqual({
      method: "POST",
      path: "/MTBFile",
      body: undefined,
    });
  });
});
