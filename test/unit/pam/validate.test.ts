import {
  AddInputSchema,
  RemoveInputSchema,
  isValidControl,
  ruleFromInput,
  validateInput,
} from "../../../src/pam/validate.js";
import { PamError, PamErrorCode } from "../../../src/shared/errors.js";

describe("isValidControl", () => {
  it.each(["required", "requisite", "sufficient", "optional", "include", "substack"])("accepts %s", (control) => {
    expect(isValidControl(control)).toBe(true);
  });

  it("accepts bracketed value=action lists", () => {
    expect(isValidControl("[success=1 default=ignore]")).toBe(true);
    expect(isValidControl("[success=ok new_authtok_reqd=ok ignore=ignore default=bad]")).toBe(true);
  });

  it.each(["mandatory", "[]", "[success]", "[success=maybe]", "[default=die", "Required"])("rejects %s", (control) => {
    expect(isValidControl(control)).toBe(false);
  });
});

describe("validateInput", () => {
  it("fills in the default position for add", () => {
    const input = validateInput(AddInputSchema, {
      service: "login",
      type: "auth",
      control: "required",
      module: "pam_unix.so",
    });
    expect(input).toEqual({ service: "login", type: "auth", control: "required", module: "pam_unix.so", position: "end" });
  });

  it("reports every missing field in one error", () => {
    let caught: unknown;
    try {
      validateInput(AddInputSchema, { service: "login" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PamError);
    expect(caught).toMatchObject({ code: PamErrorCode.VALIDATION_FAILED });
    const message = caught instanceof Error ? caught.message : "";
    expect(message).toContain("type: type must be one of auth, account, password, session");
    expect(message).toContain("control: --control is required");
    expect(message).toContain("module: --module is required");
  });

  it("rejects an unknown type keyword", () => {
    expect(() =>
      validateInput(AddInputSchema, { service: "login", type: "authz", control: "required", module: "pam_unix.so" }),
    ).toThrow("type: type must be one of auth, account, password, session");
  });

  it("rejects an unknown control keyword", () => {
    expect(() =>
      validateInput(AddInputSchema, { service: "login", type: "auth", control: "mandatory", module: "pam_unix.so" }),
    ).toThrow('control: unknown control "mandatory"');
  });

  it("rejects service names that escape the PAM directory", () => {
    expect(() => validateInput(RemoveInputSchema, { service: "../shadow", module: "pam_unix.so" })).toThrow(
      "service name must not contain a path separator",
    );
    expect(() => validateInput(RemoveInputSchema, { service: "..", module: "pam_unix.so" })).toThrow(
      "service name must not start with '.'",
    );
  });

  it("rejects '#' in any field written to the rule line", () => {
    const base = { service: "login", type: "auth", control: "required", module: "pam_unix.so" };
    expect(() => validateInput(AddInputSchema, { ...base, module: "#pam_x.so" })).toThrow("module: module must not contain '#'");
    expect(() => validateInput(AddInputSchema, { ...base, control: "[success=1#]" })).toThrow(
      "control: control must not contain '#'",
    );
    expect(() => validateInput(AddInputSchema, { ...base, args: "nullok #debug" })).toThrow("args: args must not contain '#'");
  });

  it("rejects a module containing whitespace", () => {
    expect(() => validateInput(RemoveInputSchema, { service: "login", module: "pam unix.so" })).toThrow(
      "module: module must not contain whitespace",
    );
  });
});

describe("ruleFromInput", () => {
  it("splits --args into tokens", () => {
    const rule = ruleFromInput({
      service: "login",
      type: "auth",
      control: "required",
      module: "pam_unix.so",
      args: " nullok  try_first_pass",
      position: "end",
    });
    expect(rule).toEqual({ type: "auth", control: "required", module: "pam_unix.so", args: ["nullok", "try_first_pass"] });
  });

  it("uses an empty argument list when --args is absent", () => {
    const rule = ruleFromInput({ service: "login", type: "session", control: "optional", module: "pam_motd.so", position: "end" });
    expect(rule.args).toEqual([]);
  });
});
