import {
  isValidTime,
  validateGoalsInput,
  validateMedicationInput,
  validateMetricInput,
  validatePersonName,
} from "../validation";

const TODAY = "2026-10-19";

describe("validateMedicationInput", () => {
  it("requires a name and a time", () => {
    const r = validateMedicationInput({ name: "  ", time: "08:30" }, "Self", TODAY);
    expect(r).toEqual({ ok: false, errors: ["Please fill in at least medicine name and time."] });
  });

  it("rejects malformed times and dates", () => {
    const r = validateMedicationInput({ name: "Aspirin", time: "8.30", date: "2026-02-30" }, "Self", TODAY);
    expect(r).toEqual({
      ok: false,
      errors: ['time: expected HH:MM, got "8.30"', 'date: invalid date string "2026-02-30"'],
    });
  });

  it("falls back to the active person and today", () => {
    const r = validateMedicationInput({ name: " Aspirin ", time: "08:30", person: "" }, "Mom", TODAY);
    expect(r).toEqual({
      ok: true,
      value: { person: "Mom", name: "Aspirin", date: TODAY, time: "08:30", caregiverContact: null },
    });
  });

  it("keeps a caregiver contact", () => {
    const r = validateMedicationInput(
      { name: "Statin", time: "21:00", date: "2026-10-20", person: "Dad", caregiverContact: "carer@example.com" },
      "Self",
      TODAY,
    );
    expect(r).toEqual({
      ok: true,
      value: { person: "Dad", name: "Statin", date: "2026-10-20", time: "21:00", caregiverContact: "carer@example.com" },
    });
  });
});

describe("validateMetricInput", () => {
  it("defaults counts to zero and the date to today", () => {
    expect(validateMetricInput({}, "Self", TODAY)).toEqual({
      ok: true,
      value: { person: "Self", date: TODAY, steps: 0, calories: 0 },
    });
  });

  it("accepts numeric strings", () => {
    expect(validateMetricInput({ steps: "8000", calories: "2100", date: "2026-10-18" }, "Self", TODAY)).toEqual({
      ok: true,
      value: { person: "Self", date: "2026-10-18", steps: 8000, calories: 2100 },
    });
  });

  it("rejects negative or fractional counts", () => {
    const r = validateMetricInput({ steps: -1, calories: 12.5 }, "Self", TODAY);
    expect(r).toEqual({
      ok: false,
      errors: [
        "steps: must be an integer from 0 to 2147483647, got -1",
        "calories: must be an integer from 0 to 2147483647, got 12.5",
      ],
    });
  });
});

describe("validateMetricInput range", () => {
  it("accepts the largest stored integer and rejects one past it", () => {
    expect(validateMetricInput({ steps: 2147483647, calories: 0 }, "Self", TODAY).ok).toBe(true);
    expect(validateMetricInput({ steps: 3000000000, calories: 0 }, "Self", TODAY)).toEqual({
      ok: false,
      errors: ["steps: must be an integer from 0 to 2147483647, got 3000000000"],
    });
  });
});

describe("validateGoalsInput", () => {
  it("requires both targets", () => {
    expect(validateGoalsInput({ weeklyStepsTarget: 20000 })).toEqual({
      ok: false,
      errors: ["dailyCaloriesTarget: must be an integer from 0 to 2147483647, got undefined"],
    });
  });

  it("rejects targets beyond the stored integer range", () => {
    expect(validateGoalsInput({ weeklyStepsTarget: 1e10, dailyCaloriesTarget: 2000 })).toEqual({
      ok: false,
      errors: ["weeklyStepsTarget: must be an integer from 0 to 2147483647, got 10000000000"],
    });
  });

  it("accepts zero targets", () => {
    expect(validateGoalsInput({ weeklyStepsTarget: 0, dailyCaloriesTarget: 0 })).toEqual({
      ok: true,
      value: { weeklyStepsTarget: 0, dailyCaloriesTarget: 0 },
    });
  });
});

describe("validatePersonName / isValidTime", () => {
  it("trims person names", () => {
    expect(validatePersonName({ name: "  Grandma " })).toEqual({ ok: true, value: "Grandma" });
    expect(validatePersonName({})).toEqual({ ok: false, errors: ["name is required"] });
  });

  it("checks 24-hour HH:MM", () => {
    expect(isValidTime("23:59")).toBe(true);
    expect(isValidTime("24:00")).toBe(false);
    expect(isValidTime("7:05")).toBe(false);
  });
});
