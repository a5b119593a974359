import { serializeRule, serializeRules, serializeServiceFile } from "../../../src/pam/serializer.js";
import { parseServiceText } from "../../../src/pam/parser.js";
import { insertRule } from "../../../src/pam/document.js";

describe("serializeRule", () => {
  it("joins fields with single spaces", () => {
    expect(
      serializeRule({ type: "auth", control: "required", module: "pam_unix.so", args: ["nullok", "try_first_pass"] }),
    ).toBe("auth required pam_unix.so nullok try_first_pass");
  });

  it("omits the argument list when empty", () => {
    expect(serializeRule({ type: "account", control: "required", module: "pam_nologin.so", args: [] })).toBe(
      "account required pam_nologin.so",
    );
  });

  it("prefixes the type with a dash for silent rules", () => {
    expect(
      serializeRule({ type: "session", control: "optional", module: "pam_systemd.so", args: [], silentIfMissing: true }),
    ).toBe("-session optional pam_systemd.so");
  });
});

describe("serializeRules", () => {
  it("writes one newline-terminated line per rule", () => {
    expect(
      serializeRules([
        { type: "auth", control: "required", module: "pam_env.so", args: [] },
        { type: "auth", control: "sufficient", module: "pam_unix.so", args: ["nullok"] },
      ]),
    ).toBe("auth required pam_env.so\nauth sufficient pam_unix.so nullok\n");
  });

  it("returns an empty string for no rules", () => {
    expect(serializeRules([])).toBe("");
  });
});

describe("serializeServiceFile", () => {
  it("writes untouched lines back exactly as they were read", () => {
    const text = "#%PAM-1.0\nauth\trequired\tpam_unix.so\n\n@include common-session\nbogus line\n";
    expect(serializeServiceFile(parseServiceText(text).lines)).toBe(text);
  });

  it("adds a trailing newline to a file that lacked one", () => {
    expect(serializeServiceFile(parseServiceText("auth required pam_unix.so").lines)).toBe("auth required pam_unix.so\n");
  });

  it("renders new rules in normalised form next to the original text", () => {
    const { lines } = parseServiceText("#%PAM-1.0\nauth\trequired\tpam_unix.so\n");
    const updated = insertRule(lines, { type: "account", control: "required", module: "pam_unix.so", args: [] });
    expect(serializeServiceFile(updated)).toBe("#%PAM-1.0\nauth\trequired\tpam_unix.so\naccount required pam_unix.so\n");
  });
});
