import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { loadConfig } from "../config";
import { openDatabase, type Db } from "../db/index";
import { createMembershipsRepo } from "../modules/memberships/memberships.repo";
import { buildServer } from "../server";

const FIELDS_CSV = [
  "FieldKey,ParkName,FieldName,Status",
  "Central/Field 1,Central Park,Field 1,",
  ",,,",
  "Central_Field 2,Central Park,Field 2,Inactive",
  ",Central Park,Field 3,",
  "central,Central Park,Field 4,"
].join("\n");

const SLOTS_HEADER = "Division,OfferingTeamId,GameDate,StartTime,EndTime,FieldKey,Status";

const SLOTS_CSV = [
  SLOTS_HEADER,
  "U10,lions,2026-05-02,10:00,11:00,Central/Field 1,",
  "U10,bears,2026-05-03,09:00,10:00,Central/Field 1,",
  "U10,bears,2026-05-03,09:30,10:30,Central/Field 1,",
  "U10,wolves,2026-05-03,09:30,10:30,Central/Field 1,Cancelled",
  "U12,owls,2026-05-03,09:00,10:00,North/Field 1,",
  "U12,owls,2026-05-03,09:00,10:00,Central/Field 2,",
  "U12,owls,2026-5-3,09:00,10:00,Central/Field 1,"
].join("\r\n");

function as(userId: string, leagueId = "spring"): Record<string, string> {
  return {
    "x-user-id": userId,
    "x-user-email": `${userId}@example.test`,
    "x-league-id": leagueId
  };
}

describe("slot swap API", () => {
  let db: Db;
  let app: FastifyInstance;

  beforeEach(async () => {
    db = openDatabase(":memory:");
    const memberships = createMembershipsRepo(db);
    memberships.upsert("admin-1", "spring", "LeagueAdmin");
    memberships.upsert("coach-1", "spring", "Coach");
    memberships.upsert("viewer-1", "spring", "Viewer");

    app = await buildServer({ config: loadConfig({ LOG_LEVEL: "silent" }), db });
  });

  afterEach(async () => {
    await app.close();
    db.close();
  });

  async function importFields() {
    return app.inject({
      method: "POST",
      url: "/import/fields",
      headers: { ...as("admin-1"), "content-type": "text/csv" },
      payload: FIELDS_CSV
    });
  }

  async function createSlot(userId: string, body: Record<string, unknown>) {
    return app.inject({ method: "POST", url: "/slots", headers: as(userId), payload: body });
  }

  const slotBody = {
    division: "U10",
    offeringTeamId: "tigers",
    gameDate: "2026-05-02",
    startTime: "09:00",
    endTime: "10:30",
    fieldKey: "central/field 1"
  };

  it("reports health with a database ping", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "slot-swap-api", database: "up" });
  });

  it("answers 503 from health when the database is gone", async () => {
    db.close();
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ ok: false, database: "down" });
  });

  describe("scope and identity", () => {
    it("rejects a league id mismatch", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/fields?leagueId=fall",
        headers: as("coach-1", "spring")
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("InvalidScope");
    });

    it("rejects a request without a league id", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/fields",
        headers: { "x-user-id": "coach-1" }
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe(
        "Missing leagueId. Send x-league-id header (preferred) or ?leagueId=."
      );
    });

    it("answers 401 for an anonymous caller", async () => {
      const res = await app.inject({ method: "GET", url: "/fields?leagueId=spring" });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: "Unauthorized", message: "Not authenticated." });
    });

    it("answers 403 for a non-member", async () => {
      const res = await app.inject({ method: "GET", url: "/fields", headers: as("stranger") });
      expect(res.statusCode).toBe(403);
    });

    it("describes the caller on /me", async () => {
      const res = await app.inject({ method: "GET", url: "/me", headers: as("coach-1") });
      expect(res.json()).toEqual({
        userId: "coach-1",
        email: "coach-1@example.test",
        roles: [],
        memberships: [{ leagueId: "spring", role: "Coach" }]
      });
    });
  });

  describe("leagues and memberships", () => {
    it("creates a league and makes the creator its admin", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/leagues",
        headers: as("admin-1"),
        payload: { leagueId: "fall", name: "Fall League" }
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({
        leagueId: "fall",
        name: "Fall League",
        createdBy: "admin-1",
        memberCount: 1
      });

      const me = await app.inject({ method: "GET", url: "/me", headers: as("admin-1") });
      expect(me.json().memberships).toEqual([
        { leagueId: "fall", role: "LeagueAdmin" },
        { leagueId: "spring", role: "LeagueAdmin" }
      ]);

      const again = await app.inject({
        method: "POST",
        url: "/leagues",
        headers: as("admin-1"),
        payload: { leagueId: "fall", name: "Fall League" }
      });
      expect(again.statusCode).toBe(409);
    });

    it("only lets members with a membership row create leagues", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/leagues",
        headers: as("stranger"),
        payload: { leagueId: "fall", name: "Fall League" }
      });
      expect(res.statusCode).toBe(403);
    });

    it("lets league admins list members and coaches not", async () => {
      const ok = await app.inject({ method: "GET", url: "/memberships", headers: as("admin-1") });
      expect(ok.statusCode).toBe(200);
      expect(ok.json().items.map((m: { userId: string }) => m.userId)).toEqual([
        "admin-1",
        "coach-1",
        "viewer-1"
      ]);

      const denied = await app.inject({ method: "GET", url: "/memberships", headers: as("coach-1") });
      expect(denied.statusCode).toBe(403);
      expect(denied.json().message).toBe("League admin role required.");
    });

    it("grants and removes roles", async () => {
      const put = await app.inject({
        method: "PUT",
        url: "/memberships/new-user",
        headers: as("admin-1"),
        payload: { role: " Coach " }
      });
      expect(put.statusCode).toBe(200);
      expect(put.json()).toMatchObject({ userId: "new-user", leagueId: "spring", role: "Coach" });

      const missingRole = await app.inject({
        method: "PUT",
        url: "/memberships/new-user",
        headers: as("admin-1"),
        payload: {}
      });
      expect(missingRole.statusCode).toBe(400);

      const del = await app.inject({
        method: "DELETE",
        url: "/memberships/new-user",
        headers: as("admin-1")
      });
      expect(del.statusCode).toBe(204);

      const delAgain = await app.inject({
        method: "DELETE",
        url: "/memberships/new-user",
        headers: as("admin-1")
      });
      expect(delAgain.statusCode).toBe(404);
    });
  });

  describe("field import", () => {
    it("upserts valid rows and reports the rest by file row", async () => {
      const res = await importFields();
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        leagueId: "spring",
        upserted: 2,
        rejected: 2,
        skipped: 1,
        errors: [
          { row: 5, error: "FieldKey is required." },
          {
            row: 6,
            error: 'Invalid field key "central". Use parkCode/fieldCode or parkCode_fieldCode.'
          }
        ]
      });

      const all = await app.inject({ method: "GET", url: "/fields", headers: as("viewer-1") });
      expect(
        all.json().items.map((f: { fieldKey: string; isActive: boolean }) => [f.fieldKey, f.isActive])
      ).toEqual([
        ["central/field-1", true],
        ["central/field-2", false]
      ]);

      const active = await app.inject({
        method: "GET",
        url: "/fields?activeOnly=true",
        headers: as("viewer-1")
      });
      expect(active.json().items).toHaveLength(1);
    });

    it("does not count blank lines after the last row", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/import/fields",
        headers: { ...as("admin-1"), "content-type": "text/csv" },
        payload: `${FIELDS_CSV}\n,,,\n\n`
      });
      expect(res.json()).toMatchObject({ upserted: 2, rejected: 2, skipped: 1 });
    });

    it("accepts the CSV as a multipart file upload", async () => {
      const boundary = "----slotswapboundary";
      const payload = [
        `--${boundary}`,
        'Content-Disposition: form-data; name="file"; filename="fields.csv"',
        "Content-Type: text/csv",
        "",
        FIELDS_CSV,
        `--${boundary}--`,
        ""
      ].join("\r\n");

      const res = await app.inject({
        method: "POST",
        url: "/import/fields",
        headers: { ...as("admin-1"), "content-type": `multipart/form-data; boundary=${boundary}` },
        payload
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().upserted).toBe(2);
    });

    it("rejects a file missing required columns", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/import/fields",
        headers: { ...as("admin-1"), "content-type": "text/csv" },
        payload: "FieldKey,Name\nc/f,Central"
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe("Missing required columns.");
      expect(res.json().details.missing).toEqual(["parkname", "fieldname"]);
    });

    it("rejects a header-only file", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/import/fields",
        headers: { ...as("admin-1"), "content-type": "text/plain" },
        payload: "FieldKey,ParkName,FieldName\n"
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe("No CSV rows found.");
    });

    it("is reserved for league admins", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/import/fields",
        headers: { ...as("coach-1"), "content-type": "text/csv" },
        payload: FIELDS_CSV
      });
      expect(res.statusCode).toBe(403);
    });
  });

  describe("slot creation", () => {
    beforeEach(async () => {
      await importFields();
    });

    it("creates a slot on an active field", async () => {
      const res = await createSlot("coach-1", slotBody);
      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({
        leagueId: "spring",
        division: "U10",
        offeringTeamId: "tigers",
        offeringEmail: "",
        gameDate: "2026-05-02",
        startTime: "09:00",
        endTime: "10:30",
        fieldKey: "central/field-1",
        parkName: "Central Park",
        fieldName: "Field 1",
        displayName: "Central Park > Field 1",
        gameType: "Swap",
        status: "Open",
        createdBy: "coach-1@example.test"
      });
      expect(res.json()).not.toHaveProperty("startMinutes");
    });

    it("rejects an overlapping slot but allows back-to-back ones", async () => {
      await createSlot("coach-1", slotBody);

      const clash = await createSlot("coach-1", { ...slotBody, startTime: "10:00", endTime: "11:00" });
      expect(clash.statusCode).toBe(409);
      expect(clash.json().error).toBe("Conflict");

      const next = await createSlot("coach-1", { ...slotBody, startTime: "10:30", endTime: "11:30" });
      expect(next.statusCode).toBe(201);
    });

    it("rejects unknown and inactive fields", async () => {
      const unknown = await createSlot("coach-1", { ...slotBody, fieldKey: "north/field-1" });
      expect(unknown.statusCode).toBe(400);
      expect(unknown.json().message).toBe("Field not found. Import fields first.");

      const inactive = await createSlot("coach-1", { ...slotBody, fieldKey: "Central_Field 2" });
      expect(inactive.statusCode).toBe(409);
      expect(inactive.json().message).toBe("Field exists but is inactive.");
    });

    it("returns validation messages as 400s", async () => {
      const res = await createSlot("coach-1", { ...slotBody, gameDate: "" });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "ValidationFailed", message: "gameDate is required." });
    });

    it("does not let viewers create slots", async () => {
      const res = await createSlot("viewer-1", slotBody);
      expect(res.statusCode).toBe(403);
      expect(res.json().message).toBe("Viewers cannot change league data.");
    });
  });

  describe("slot import", () => {
    beforeEach(async () => {
      await importFields();
      await createSlot("coach-1", slotBody);
    });

    async function importSlots(payload = SLOTS_CSV) {
      return app.inject({
        method: "POST",
        url: "/import/slots",
        headers: { ...as("admin-1"), "content-type": "text/csv" },
        payload
      });
    }

    async function slotsOn(gameDate: string) {
      const res = await app.inject({
        method: "GET",
        url: `/slots?gameDate=${gameDate}`,
        headers: as("viewer-1")
      });
      return res.json();
    }

    it("validates rows independently and checks overlaps", async () => {
      const res = await importSlots();
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        leagueId: "spring",
        upserted: 2,
        rejected: 5,
        skipped: 0,
        errors: [
          { row: 2, error: "Slot overlaps an existing slot on this field.", fieldKey: "Central/Field 1" },
          { row: 4, error: "Slot overlaps an existing slot on this field.", fieldKey: "Central/Field 1" },
          { row: 6, error: "Field not found (import fields first).", fieldKey: "North/Field 1" },
          { row: 7, error: "Field exists but is inactive.", fieldKey: "Central/Field 2" },
          { row: 8, error: "GameDate must be YYYY-MM-DD." }
        ]
      });
    });

    it("updates the same slots when a file is imported twice", async () => {
      await importSlots();
      const second = await importSlots();
      expect(second.json().upserted).toBe(2);

      const list = await app.inject({
        method: "GET",
        url: "/slots?gameDate=2026-05-03",
        headers: as("viewer-1")
      });
      const body = list.json();
      expect(body.total).toBe(2);
      expect(
        body.items.map((s: { offeringTeamId: string; status: string }) => [s.offeringTeamId, s.status])
      ).toEqual([
        ["bears", "Open"],
        ["wolves", "Cancelled"]
      ]);
      expect(body.items[0].createdBy).toBe("admin-1@example.test");
    });

    it("counts a row repeated in one file once", async () => {
      const row = "U10,hawks,2026-05-04,10:00,11:00,Central/Field 1,";
      const res = await importSlots([SLOTS_HEADER, row, row].join("\n"));
      expect(res.json()).toEqual({
        leagueId: "spring",
        upserted: 1,
        rejected: 0,
        skipped: 0,
        errors: []
      });
      expect((await slotsOn("2026-05-04")).total).toBe(1);
    });

    it("frees the time of a slot the same file cancels", async () => {
      await importSlots([SLOTS_HEADER, "U10,hawks,2026-05-04,10:00,11:00,Central/Field 1,"].join("\n"));

      const res = await importSlots(
        [
          SLOTS_HEADER,
          "U10,hawks,2026-05-04,10:00,11:00,Central/Field 1,Cancelled",
          "U12,owls,2026-05-04,10:00,11:00,Central/Field 1,"
        ].join("\n")
      );
      expect(res.json()).toEqual({
        leagueId: "spring",
        upserted: 2,
        rejected: 0,
        skipped: 0,
        errors: []
      });

      const body = await slotsOn("2026-05-04");
      expect(
        body.items.map((s: { offeringTeamId: string; status: string }) => [s.offeringTeamId, s.status])
      ).toEqual([
        ["hawks", "Cancelled"],
        ["owls", "Open"]
      ]);
    });

    it("pages the slot list", async () => {
      await importSlots();
      const res = await app.inject({
        method: "GET",
        url: "/slots?page=2&limit=2",
        headers: as("coach-1")
      });
      expect(res.json()).toMatchObject({ total: 3, page: 2, limit: 2 });
      expect(res.json().items).toHaveLength(1);
    });
  });
});
