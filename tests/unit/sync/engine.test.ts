import { describe, it, expect } from "vitest";

import {
  ConfigurationError,
  DependencyCycleError,
  RemotePermanentError,
  RemoteTransientError,
} from "../../../src/errors.js";
import {
  courses,
  ENTITY_DEFINITIONS,
  sections,
  teachers,
} from "../../../src/mapping/entities/index.js";
import {
  defaultDeletePolicy,
  SyncEngine,
  type EngineOptions,
} from "../../../src/sync/engine.js";
import { HttpRemoteStore } from "../../../src/remote/client.js";
import { dependenciesOf } from "../../../src/sync/graph.js";
import { exitCodeFor } from "../../../src/sync/reporter.js";
import {
  courseRows,
  fullExtract,
  teacherRows,
} from "../../fixtures/extract.js";
import { InMemoryRecordReader, type ExtractData } from "../../mocks/reader.js";
import { InMemoryRemoteStore } from "../../mocks/remote-store.js";

import type { PassResult, RunSummary } from "../../../src/sync/reporter.js";
import type { EntityType } from "../../../src/types/index.js";

function createEngine(
  extract: ExtractData,
  store: InMemoryRemoteStore,
  options: Partial<EngineOptions> = {}
): SyncEngine {
  return new SyncEngine(
    ENTITY_DEFINITIONS,
    new InMemoryRecordReader(extract),
    store,
    { maxRetries: 2, retryMinTimeoutMs: 0, ...options }
  );
}

function passOf(summary: RunSummary, type: EntityType): PassResult {
  const pass = summary.passes.find((p) => p.entityType === type);
  if (pass === undefined) {
    throw new Error(`No pass for ${type}`);
  }
  return pass;
}

describe("sync/engine", () => {
  // ============================================================================
  // Full runs
  // ============================================================================

  describe("first run against an empty remote", () => {
    it("should create every record in dependency order", async () => {
      const store = new InMemoryRemoteStore();
      const summary = await createEngine(fullExtract(), store).run();

      expect(summary.status).toBe("success");
      expect(exitCodeFor(summary.status)).toBe(0);
      expect(summary.totals).toEqual({
        new: 8,
        changed: 0,
        unchanged: 0,
        removed: 0,
        failed: 0,
      });
      expect(store.writes().map((call) => call.endpoint)).toEqual([
        "families",
        "teachers",
        "students",
        "courses",
        "sections",
        "registrations",
        "enrollments",
        "discipline-records",
      ]);
    });

    it("should send canonical payloads with natural-key references", async () => {
      const store = new InMemoryRemoteStore();
      await createEngine(fullExtract(), store).run();

      const payloads = new Map(
        store.writes().map((call) => [call.endpoint, call.payload])
      );

      expect(payloads.get("students")).toEqual({
        student_id: "S1",
        first_name: "Sam",
        last_name: "Rivera",
        nickname: "",
        email: "sam@school.example.org",
        gender: "M",
        grade: 9,
        status: "enrolled",
        is_boarder: false,
        family_id: "F1",
      });
      expect(payloads.get("sections")).toEqual({
        section_id: "SEC1",
        term: "Fall",
        period: 2,
        room: "B12",
        course_id: "C1",
        teacher_id: "T1",
      });
      expect(payloads.get("registrations")).toEqual({
        registration_id: "R1",
        start_date: "2026-09-01",
        end_date: null,
        status: "active",
        student_id: "S1",
        section_id: "SEC1",
      });
    });

    it("should finish every write of a type before writing its dependents", async () => {
      const store = new InMemoryRemoteStore();
      await createEngine(fullExtract(), store).run();

      const endpoints = store.writes().map((call) => call.endpoint);
      const endpointOf = new Map(
        ENTITY_DEFINITIONS.map((definition) => [definition.type, definition.endpoint])
      );

      for (const definition of ENTITY_DEFINITIONS) {
        const firstWrite = endpoints.indexOf(definition.endpoint);
        for (const dependency of dependenciesOf(definition)) {
          const lastDependencyWrite = endpoints.lastIndexOf(
            endpointOf.get(dependency) ?? ""
          );
          expect(lastDependencyWrite).toBeLessThan(firstWrite);
        }
      }
    });
  });

  describe("idempotence", () => {
    it("should issue no writes when the extract has not changed", async () => {
      const store = new InMemoryRemoteStore();
      await createEngine(fullExtract(), store).run();
      const writesAfterFirstRun = store.writes().length;

      const summary = await createEngine(fullExtract(), store).run();

      expect(store.writes()).toHaveLength(writesAfterFirstRun);
      expect(summary.status).toBe("success");
      expect(summary.totals).toEqual({
        new: 0,
        changed: 0,
        unchanged: 8,
        removed: 0,
        failed: 0,
      });
    });
  });

  // ============================================================================
  // Diff application
  // ============================================================================

  describe("diff application", () => {
    it("should keep A, delete B and create C", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("courses", [
        { course_id: "A", course_name: "v1" },
        { course_id: "B", course_name: "v2" },
      ]);

      const summary = await createEngine(
        {
          courses: [
            { CourseNumber: "A", CourseName: "v1" },
            { CourseNumber: "C", CourseName: "v3" },
          ],
        },
        store
      ).run();

      expect(passOf(summary, "courses").counts).toEqual({
        new: 1,
        changed: 0,
        unchanged: 1,
        removed: 1,
        failed: 0,
      });

      const writes = store.writes();
      expect(writes).toHaveLength(2);
      expect(writes.find((call) => call.method === "create")?.payload).toMatchObject({
        course_id: "C",
        course_name: "v3",
      });
      expect(writes.find((call) => call.method === "remove")?.locator).toBe(
        "memory://courses/2/"
      );
      expect(
        store.records("courses").map((record) => record.course_id).sort()
      ).toEqual(["A", "C"]);
    });

    it("should update a record whose fields differ", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("courses", [{ course_id: "C1", course_name: "Algebra" }]);

      const summary = await createEngine({ courses: courseRows }, store).run();

      const update = store.writes().find((call) => call.method === "update");
      expect(update?.locator).toBe("memory://courses/1/");
      expect(update?.payload).toMatchObject({
        course_id: "C1",
        course_name: "Algebra I",
      });
      expect(passOf(summary, "courses").counts.changed).toBe(1);
    });

    it("should never remove discipline records", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("discipline-records", [
        { record_id: "D9", incident_date: "2026-01-01", category: "tardy" },
      ]);

      const summary = await createEngine({}, store).run();

      expect(store.writes()).toEqual([]);
      expect(summary.status).toBe("success");
    });
  });

  // ============================================================================
  // Scenarios
  // ============================================================================

  describe("scenarios", () => {
    it("should create section S1 after its teacher T1 and course C1", async () => {
      const store = new InMemoryRemoteStore();
      const summary = await createEngine(
        {
          teachers: teacherRows,
          courses: courseRows,
          sections: [
            { IDSECTION: "S1", CourseNumber: "C1", IDTEACHER: "T1", Term: "Fall" },
          ],
        },
        store
      ).run();

      expect(summary.status).toBe("success");
      expect(store.writes().map((call) => call.endpoint)).toEqual([
        "teachers",
        "courses",
        "sections",
      ]);
      expect(store.writes()[2]?.payload).toMatchObject({
        section_id: "S1",
        course_id: "C1",
        teacher_id: "T1",
      });
    });

    it("should sync a course whose optional number arrives as text", async () => {
      const store = new InMemoryRemoteStore();
      const summary = await createEngine(
        {
          teachers: teacherRows,
          courses: [{ CourseNumber: "C1", CourseName: "Algebra", Credits: "3" }],
          sections: [
            { IDSECTION: "S1", CourseNumber: "C1", IDTEACHER: "T1", Term: "Fall" },
          ],
        },
        store
      ).run();

      expect(summary.status).toBe("success");
      expect(summary.failures).toEqual([]);
      expect(store.records("courses").map((fields) => fields.credits)).toEqual([3]);
      expect(store.records("sections")).toHaveLength(1);
    });

    it("should exclude a section whose course is missing and report a partial run", async () => {
      const store = new InMemoryRemoteStore();
      const summary = await createEngine(
        {
          teachers: teacherRows,
          courses: courseRows,
          sections: [
            { IDSECTION: "SEC1", CourseNumber: "C1", IDTEACHER: "T1", Term: "Fall" },
            { IDSECTION: "SEC2", CourseNumber: "C9", IDTEACHER: "T1", Term: "Fall" },
          ],
        },
        store
      ).run();

      expect(summary.status).toBe("partial");
      expect(exitCodeFor(summary.status)).toBe(2);
      expect(summary.failures).toEqual([
        {
          entityType: "sections",
          stage: "map",
          kind: "UNRESOLVED_REFERENCE",
          message: "course_id 'C9' does not match any courses record",
          key: "SEC2",
          index: 1,
        },
      ]);
      expect(passOf(summary, "sections").counts).toEqual({
        new: 1,
        changed: 0,
        unchanged: 0,
        removed: 0,
        failed: 1,
      });
    });

    it("should skip the dependents of a malformed file and run the rest", async () => {
      const store = new InMemoryRemoteStore();
      const summary = await createEngine(
        { ...fullExtract(), courses: '{"rows": []}' },
        store
      ).run();

      const courses = passOf(summary, "courses");
      expect(courses.status).toBe("failed");
      expect(courses.fatalKind).toBe("MALFORMED_INPUT");
      expect(courses.reason).toBe(
        'memory:courses must contain an array of records or an object with a "records" array'
      );

      for (const type of ["sections", "registrations", "enrollments"] as const) {
        expect(passOf(summary, type).status).toBe("skipped");
        expect(passOf(summary, type).reason).toBe(
          "Depends on courses, which failed"
        );
      }
      for (const type of ["families", "teachers", "students", "discipline"] as const) {
        expect(passOf(summary, type).status).toBe("completed");
      }

      expect(summary.status).toBe("failure");
      expect(exitCodeFor(summary.status)).toBe(1);
      expect(store.writes().map((call) => call.endpoint)).toEqual([
        "families",
        "teachers",
        "students",
        "discipline-records",
      ]);
    });

    it("should skip the dependents of a failed bulk read", async () => {
      const store = new InMemoryRemoteStore();
      store.failOn(
        (call) => call.method === "list" && call.endpoint === "sections",
        () => new RemotePermanentError("GET sections failed with 403 Forbidden", 403)
      );

      const summary = await createEngine(fullExtract(), store).run();

      const sectionPass = passOf(summary, "sections");
      expect(sectionPass.status).toBe("failed");
      expect(sectionPass.fatalKind).toBe("REMOTE_PERMANENT");
      expect(sectionPass.reason).toBe(
        "Bulk read of sections failed: GET sections failed with 403 Forbidden"
      );
      expect(passOf(summary, "registrations").status).toBe("skipped");
      expect(passOf(summary, "enrollments").status).toBe("skipped");
      expect(passOf(summary, "discipline").status).toBe("completed");
      expect(
        store.calls.filter(
          (call) => call.method === "list" && call.endpoint === "sections"
        )
      ).toHaveLength(1);
    });
  });

  // ============================================================================
  // Failure handling
  // ============================================================================

  describe("failure handling", () => {
    it("should retry transient failures until the call succeeds", async () => {
      const store = new InMemoryRemoteStore();
      store.failOn(
        (call) => call.method === "create",
        () => new RemoteTransientError("Service unavailable", 503),
        2
      );

      const summary = await createEngine({ courses: courseRows }, store).run();

      expect(summary.status).toBe("success");
      expect(passOf(summary, "courses").counts.new).toBe(1);
      expect(store.calls.filter((call) => call.method === "create")).toHaveLength(3);
    });

    it("should record a failure once the retries run out", async () => {
      const store = new InMemoryRemoteStore();
      store.failOn(
        (call) => call.method === "create",
        () => new RemoteTransientError("Service unavailable", 503)
      );

      const summary = await createEngine({ courses: courseRows }, store).run();

      expect(store.calls.filter((call) => call.method === "create")).toHaveLength(3);
      expect(summary.status).toBe("partial");
      expect(summary.failures).toEqual([
        {
          entityType: "courses",
          stage: "create",
          kind: "REMOTE_TRANSIENT",
          message: "Service unavailable",
          key: "C1",
        },
      ]);
    });

    it("should treat a timed-out call as transient and retry it", async () => {
      const store = new InMemoryRemoteStore();
      store.delayOn((call) => call.method === "create", 200, 1);

      const summary = await createEngine({ courses: courseRows }, store, {
        requestTimeoutMs: 20,
        maxRetries: 1,
      }).run();

      expect(passOf(summary, "courses").counts).toMatchObject({ new: 1, failed: 0 });
      expect(store.calls.filter((call) => call.method === "create")).toHaveLength(2);
    });

    it("should bound each page of a bulk read, not the whole read", async () => {
      const root = "https://sis.example.org/api/";
      const list = `${root}courses/`;
      const course = (id: number): Record<string, unknown> => ({
        url: `${list}${String(id)}/`,
        course_id: `C${String(id)}`,
      });
      const responses: Record<string, unknown> = {
        [root]: { courses: list },
        [`${list}?page_size=1`]: { next: `${list}?page=2`, results: [course(1)] },
        [`${list}?page=2`]: { next: `${list}?page=3`, results: [course(2)] },
        [`${list}?page=3`]: { next: null, results: [course(3)] },
      };
      const requested: string[] = [];
      const fetchFn = async (...args: Parameters<typeof fetch>): Promise<Response> => {
        const [input] = args;
        const url =
          typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
        requested.push(url);
        await new Promise((resolve) => setTimeout(resolve, 60));
        const body = responses[url];
        return body === undefined
          ? new Response(null, { status: 404, statusText: "Not Found" })
          : new Response(JSON.stringify(body), { status: 200 });
      };
      const store = new HttpRemoteStore({
        apiRoot: root,
        pageSize: 1,
        requestTimeoutMs: 100,
        fetchFn,
      });

      const summary = await new SyncEngine(
        [courses],
        new InMemoryRecordReader({ courses: courseRows }),
        store,
        { requestTimeoutMs: 100, maxRetries: 0, dryRun: true }
      ).run();

      expect(passOf(summary, "courses")).toMatchObject({
        status: "completed",
        counts: { new: 0, changed: 1, removed: 2, failed: 0 },
      });
      expect(requested).toEqual([
        root,
        `${list}?page_size=1`,
        `${list}?page=2`,
        `${list}?page=3`,
      ]);
    });

    it("should not retry a permanent failure nor let it stop its siblings", async () => {
      const store = new InMemoryRemoteStore();
      store.failOn(
        (call) => call.method === "create" && call.payload?.course_id === "C2",
        () =>
          new RemotePermanentError(
            "course_name: Ensure this field has no more than 10 characters.",
            400
          )
      );

      const summary = await createEngine(
        {
          courses: [
            { CourseNumber: "C1", CourseName: "Algebra I" },
            { CourseNumber: "C2", CourseName: "A very long course name" },
            { CourseNumber: "C3", CourseName: "Biology" },
          ],
        },
        store
      ).run();

      expect(passOf(summary, "courses").counts).toMatchObject({ new: 2, failed: 1 });
      expect(
        store.calls.filter(
          (call) => call.method === "create" && call.payload?.course_id === "C2"
        )
      ).toHaveLength(1);
      expect(summary.failures).toEqual([
        {
          entityType: "courses",
          stage: "create",
          kind: "REMOTE_PERMANENT",
          message: "course_name: Ensure this field has no more than 10 characters.",
          key: "C2",
        },
      ]);
      expect(summary.status).toBe("partial");
    });

    it("should fail the run when a pass crosses the failure threshold", async () => {
      const store = new InMemoryRemoteStore();
      store.failOn(
        (call) => call.method === "create" && call.payload?.course_id === "C2",
        () => new RemotePermanentError("Bad request", 400)
      );

      const summary = await createEngine(
        {
          courses: [
            { CourseNumber: "C1", CourseName: "Algebra I" },
            { CourseNumber: "C2", CourseName: "Biology" },
          ],
        },
        store,
        { failureThreshold: 0.4 }
      ).run();

      const coursePass = passOf(summary, "courses");
      expect(coursePass.status).toBe("over-threshold");
      expect(coursePass.reason).toBe("Failure rate 50.0% exceeds threshold 40.0%");
      expect(passOf(summary, "sections").status).toBe("completed");
      expect(summary.status).toBe("failure");
    });
  });

  // ============================================================================
  // Delete policies and protection
  // ============================================================================

  describe("delete policies", () => {
    it("should mark a missing student inactive once", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("students", [
        { student_id: "S9", first_name: "Old", last_name: "Student", status: "enrolled" },
      ]);
      const extract: ExtractData = {
        students: [{ IDSTUDENT: "S1", NameFirst: "Sam", NameLast: "Rivera" }],
      };
      const options = { deletePolicies: { students: "inactive" as const } };

      const first = await createEngine(extract, store, options).run();

      expect(passOf(first, "students").counts).toMatchObject({ new: 1, removed: 1 });
      const patches = store.writes().filter((call) => call.method === "patch");
      expect(patches).toHaveLength(1);
      expect(patches[0]?.locator).toBe("memory://students/1/");
      expect(patches[0]?.payload).toEqual({ status: "inactive" });

      await createEngine(extract, store, options).run();

      expect(store.writes().filter((call) => call.method === "patch")).toHaveLength(1);
      expect(store.writes()).toHaveLength(2);
    });

    it("should not delete the remote record of a row that failed validation", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("courses", [{ course_id: "C2", course_name: "Geometry" }]);

      const summary = await createEngine(
        {
          courses: [
            { CourseNumber: "C1", CourseName: "Algebra I" },
            { CourseNumber: "C2" },
          ],
        },
        store
      ).run();

      expect(store.writes().map((call) => call.method)).toEqual(["create"]);
      expect(summary.failures).toHaveLength(1);
      expect(summary.failures[0]).toMatchObject({
        entityType: "courses",
        stage: "load",
        kind: "FIELD_VALIDATION",
        key: "C2",
        index: 1,
      });
      expect(store.records("courses").map((record) => record.course_id)).toContain("C2");
    });

    it("should default to hard delete only for deletable types", () => {
      expect(defaultDeletePolicy(courses)).toBe("hard");
      expect(
        defaultDeletePolicy({ ...courses, deletable: false })
      ).toBe("never");
    });
  });

  // ============================================================================
  // Run control
  // ============================================================================

  describe("run control", () => {
    it("should write nothing on a dry run but still count the changes", async () => {
      const store = new InMemoryRemoteStore();
      store.seed("courses", [{ course_id: "B", course_name: "v2" }]);

      const summary = await createEngine(
        { courses: [{ CourseNumber: "A", CourseName: "v1" }] },
        store,
        { dryRun: true }
      ).run();

      expect(store.writes()).toEqual([]);
      expect(summary.dryRun).toBe(true);
      expect(passOf(summary, "courses").counts).toEqual({
        new: 1,
        changed: 0,
        unchanged: 0,
        removed: 1,
        failed: 0,
      });
    });

    it("should stop between passes once aborted", async () => {
      const store = new InMemoryRemoteStore();
      const controller = new AbortController();
      const engine = createEngine(fullExtract(), store, {
        signal: controller.signal,
      });
      engine.setProgressCallback((progress) => {
        if (progress.phase === "courses") {
          controller.abort();
        }
      });

      const summary = await engine.run();

      expect(summary.passes.map((pass) => [pass.entityType, pass.status])).toEqual([
        ["families", "completed"],
        ["teachers", "completed"],
        ["students", "completed"],
        ["courses", "completed"],
        ["sections", "skipped"],
        ["registrations", "skipped"],
        ["enrollments", "skipped"],
        ["discipline", "skipped"],
      ]);
      expect(passOf(summary, "discipline").reason).toBe("Run aborted");
      expect(summary.status).toBe("failure");
      expect(store.writes().map((call) => call.endpoint)).toEqual([
        "families",
        "teachers",
        "students",
        "courses",
      ]);
    });

    it("should expose the pass order", () => {
      const engine = createEngine({}, new InMemoryRemoteStore());
      expect(engine.order).toEqual([
        "families",
        "teachers",
        "students",
        "courses",
        "sections",
        "registrations",
        "enrollments",
        "discipline",
      ]);
    });
  });

  // ============================================================================
  // Startup checks
  // ============================================================================

  describe("startup checks", () => {
    it("should reject a dependency cycle", () => {
      const cyclicCourses = {
        ...courses,
        references: [
          { field: "section_id", source: "IDSECTION", target: "sections" as const },
        ],
      };

      expect(
        () =>
          new SyncEngine(
            [teachers, cyclicCourses, sections],
            new InMemoryRecordReader({}),
            new InMemoryRemoteStore()
          )
      ).toThrow(DependencyCycleError);
    });

    it("should reject an inactive policy on a type without an inactive marker", () => {
      expect(() =>
        createEngine({}, new InMemoryRemoteStore(), {
          deletePolicies: { courses: "inactive" },
        })
      ).toThrow(
        new ConfigurationError(
          "SYNC_DELETE_POLICY",
          "courses has no inactive marker; use hard or never"
        )
      );
    });
  });
});
