import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  HOMEWORK_VERDICTS,
  NO_UPDATE_MESSAGE,
  parseStatus
} from "../../src/renderer/index.js";
import { AppError } from "../../src/orchestrator/errors.js";

function captureError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected function to throw");
}

describe("parseStatus", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
  });

  it.each([
    ["approved", "Работа проверена: ревьюеру всё понравилось. Ура!"],
    ["reviewing", "Работа взята на проверку ревьюером."],
    ["rejected", "Работа проверена: у ревьюера есть замечания."]
  ])("formats the %s verdict", (status, verdict) => {
    expect(parseStatus({ homework_name: "hw1", status })).toBe(
      `Изменился статус проверки работы "hw1". ${verdict}`
    );
  });

  it("exposes exactly three verdicts", () => {
    expect(Object.keys(HOMEWORK_VERDICTS)).toEqual([
      "approved",
      "reviewing",
      "rejected"
    ]);
    expect(Object.isFrozen(HOMEWORK_VERDICTS)).toBe(true);
  });

  it("returns the unchanged message for the no-update value", () => {
    expect(parseStatus(null)).toBe(NO_UPDATE_MESSAGE);
    expect(NO_UPDATE_MESSAGE).toBe("Статус проверки работы не изменился");
  });

  it("fails when homework_name is missing", () => {
    const error = captureError(() => parseStatus({ status: "approved" }));
    expect(error.code).toBe("HOMEWORK_NAME_MISSING");
    expect(error.message).toBe('Отсутствует ключ "homework_name"');
  });

  it("fails when status is missing", () => {
    const error = captureError(() => parseStatus({ homework_name: "hw1" }));
    expect(error.code).toBe("HOMEWORK_STATUS_MISSING");
  });

  it("fails when status is empty", () => {
    const error = captureError(() =>
      parseStatus({ homework_name: "hw1", status: "" })
    );
    expect(error.code).toBe("HOMEWORK_STATUS_EMPTY");
    expect(error.message).toBe("Статус проверки работы пуст");
  });

  it("fails on an unrecognized status", () => {
    const error = captureError(() =>
      parseStatus({ homework_name: "hw1", status: "graded" })
    );
    expect(error.code).toBe("HOMEWORK_STATUS_UNKNOWN");
    expect(error.details).toEqual({ status: "graded" });
    expect(error.message).toBe(
      "Статус проверки не соответствует ожидаемым вариантам: graded"
    );
  });

  it("does not resolve inherited keys as verdicts", () => {
    const error = captureError(() =>
      parseStatus({ homework_name: "hw1", status: "toString" })
    );
    expect(error.code).toBe("HOMEWORK_STATUS_UNKNOWN");
  });

  it("treats a non-mapping entry as missing homework_name", () => {
    const error = captureError(() => parseStatus("not-a-record"));
    expect(error.code).toBe("HOMEWORK_NAME_MISSING");
  });
});
