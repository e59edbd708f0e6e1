import { expectTypeOf } from "expect-type";
import type { Insertable, Selectable, Updateable } from "kysely";
import { describe, expect, it } from "vitest";
import type { AcquisitionJobsTable, JsonValue } from "./schema.js";

describe("acquisition job columns", () => {
  it("selects defaulted timestamps as dates", () => {
    expectTypeOf<Selectable<AcquisitionJobsTable>["run_after"]>().toEqualTypeOf<Date>();
    expectTypeOf<Selectable<AcquisitionJobsTable>["created_at"]>().toEqualTypeOf<Date>();
    expectTypeOf<Selectable<AcquisitionJobsTable>["updated_at"]>().toEqualTypeOf<Date>();
  });

  it("leaves defaulted columns out of inserts", () => {
    expectTypeOf<{
      name: string;
      queue: string;
      kind: "entity";
      payload: JsonValue;
    }>().toExtend<Insertable<AcquisitionJobsTable>>();
    expectTypeOf<Insertable<AcquisitionJobsTable>["run_after"]>().toEqualTypeOf<
      Date | string | undefined
    >();
  });

  it("accepts dates and strings in updates", () => {
    const update: Updateable<AcquisitionJobsTable> = {
      run_after: new Date("2024-01-01T00:00:00.000Z"),
      updated_at: "2024-01-01T00:00:00.000Z",
    };
    expect(update.run_after).toEqual(new Date("2024-01-01T00:00:00.000Z"));
  });
});
