/**
 * Tests for menu and prompt parsing.
 */

import { describe, it, expect } from "vitest";
import {
  CLIENT_MENU,
  MAIN_MENU,
  parseAccountId,
  parseAmountInput,
  parseMenuChoice,
} from "../src/commands.js";

describe("parseMenuChoice", () => {
  it("maps main menu numbers to actions", () => {
    expect(parseMenuChoice("1", MAIN_MENU)).toEqual({ ok: true, value: "create-account" });
    expect(parseMenuChoice("6", MAIN_MENU)).toEqual({ ok: true, value: "reconcile" });
    expect(parseMenuChoice(" 7 ", MAIN_MENU)).toEqual({ ok: true, value: "exit" });
  });

  it("maps client menu numbers to actions", () => {
    expect(parseMenuChoice("3", CLIENT_MENU)).toEqual({ ok: true, value: "transfer" });
    expect(parseMenuChoice("6", CLIENT_MENU)).toEqual({ ok: true, value: "back" });
  });

  it.each(["0", "8", "", "abc", "1.0", "-1"])("rejects %j for the main menu", (input) => {
    expect(parseMenuChoice(input, MAIN_MENU)).toEqual({
      ok: false,
      message: `Invalid option "${input.trim()}": choose a number from 1 to 7`,
    });
  });

  it("reports the client menu range", () => {
    expect(parseMenuChoice("7", CLIENT_MENU)).toEqual({
      ok: false,
      message: 'Invalid option "7": choose a number from 1 to 6',
    });
  });
});

describe("parseAccountId", () => {
  it("parses positive integers", () => {
    expect(parseAccountId("1")).toEqual({ ok: true, value: 1 });
    expect(parseAccountId(" 42 ")).toEqual({ ok: true, value: 42 });
  });

  it.each(["0", "-3", "2.5", "x", "", "99999999999999999999"])("rejects %j", (input) => {
    expect(parseAccountId(input)).toEqual({
      ok: false,
      message: `Client ID must be a positive integer, got "${input}"`,
    });
  });
});

describe("parseAmountInput", () => {
  it("accepts plain decimals and trims them", () => {
    expect(parseAmountInput("25")).toEqual({ ok: true, value: "25" });
    expect(parseAmountInput(" 25.50 ")).toEqual({ ok: true, value: "25.50" });
  });

  it.each(["-5", "1e3", "NaN", "Infinity", "", "12,5", ".5"])("rejects %j", (input) => {
    expect(parseAmountInput(input)).toEqual({
      ok: false,
      message: `Amount must be a plain decimal number, got "${input}"`,
    });
  });
});
