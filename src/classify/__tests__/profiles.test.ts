import assert from "node:assert/strict";
import { test } from "node:test";
import { ProfileValidationError, UnknownProfileError } from "../../errors/profile.errors.js";
import type { Profile } from "../../types.js";
import { BUILTIN_PROFILES, findProfile, mergeProfiles, requiredFieldsForProfile, validateProfile } from "../profiles.js";

const baseProfile: Profile = {
  id: "custom",
  name: "Custom",
  groups: ["App", "Infra"],
  defaultGroup: "Infra",
  rules: [{ when: { kind: "contains", field: "location", values: ["app"] }, group: "App" }],
  exploitGroups: ["Infra"],
  severity: { match: "contains", unrecognized: "separate" }
};

test("every built-in profile is valid", () => {
  for (const profile of BUILTIN_PROFILES) {
    assert.equal(validateProfile(profile), profile);
  }
});

test("validateProfile collects every issue before throwing", () => {
  const broken: Profile = {
    ...baseProfile,
    groups: ["App", "App", " "],
    defaultGroup: "Missing",
    exploitGroups: ["Ops"],
    rules: [
      { when: { kind: "contains", field: "location", values: [""] }, group: "Web" },
      {
        when: { kind: "any", predicates: [] },
        pool: "tooling",
        rules: [{ when: { kind: "oneOf", field: "asset", values: ["x"] }, group: "Nope" }],
        defaultGroup: "Also"
      }
    ]
  };
  assert.throws(
    () => validateProfile(broken),
    (err) => {
      assert.ok(err instanceof ProfileValidationError);
      assert.equal(err.profileId, "custom");
      assert.deepStrictEqual(err.issues, [
        'group "App" is declared twice',
        "group names must not be blank",
        'default group "Missing" is not a declared group',
        'exploit group "Ops" is not a declared group',
        "rules[0].when: contains on location has a blank value at [0]",
        'rules[0]: group "Web" is not a declared group',
        "rules[1].when: any has no predicates",
        'rules[1]: pool "tooling" default group "Also" is not a declared group',
        'rules[1].rules[0]: group "Nope" is not a declared group'
      ]);
      return true;
    }
  );
});

test("a blank keyword next to real ones is rejected", () => {
  const catchAll: Profile = {
    ...baseProfile,
    groups: ["Tool", "DB"],
    defaultGroup: "DB",
    exploitGroups: [],
    rules: [{ when: { kind: "contains", field: "asset", values: ["", "bamboo", "  "] }, group: "Tool" }]
  };
  assert.throws(
    () => validateProfile(catchAll),
    (err) => {
      assert.ok(err instanceof ProfileValidationError);
      assert.deepStrictEqual(err.issues, [
        "rules[0].when: contains on asset has a blank value at [0]",
        "rules[0].when: contains on asset has a blank value at [2]"
      ]);
      return true;
    }
  );
});

test("groups that map to the same file name are rejected, ignoring case", () => {
  const clashing: Profile = {
    ...baseProfile,
    groups: ["Dev Build", "Dev/Build", "Ops", "OPS!"],
    defaultGroup: "Ops",
    exploitGroups: [],
    rules: []
  };
  assert.throws(
    () => validateProfile(clashing),
    (err) => {
      assert.ok(err instanceof ProfileValidationError);
      assert.deepStrictEqual(err.issues, [
        'groups "Dev Build" and "Dev/Build" would be written to the same file',
        'groups "Ops" and "OPS!" would be written to the same file'
      ]);
      return true;
    }
  );
});

test("requiredFieldsForProfile adds fields referenced by rules", () => {
  assert.deepStrictEqual(requiredFieldsForProfile(findProfile(BUILTIN_PROFILES, "broker")), [
    "asset",
    "location",
    "severity"
  ]);
  assert.deepStrictEqual(requiredFieldsForProfile(findProfile(BUILTIN_PROFILES, "platform")), [
    "asset",
    "location",
    "severity",
    "tier"
  ]);
});

test("mergeProfiles lets configured profiles replace built-ins by id", () => {
  const override: Profile = { ...baseProfile, id: "broker", name: "Broker (custom)" };
  const merged = mergeProfiles([override, baseProfile]);
  assert.deepStrictEqual(
    merged.map((profile) => profile.id),
    ["broker", "shopper", "employer", "platform", "custom"]
  );
  assert.equal(findProfile(merged, "broker").name, "Broker (custom)");
});

test("findProfile is case-insensitive and reports available ids", () => {
  assert.equal(findProfile(BUILTIN_PROFILES, " Shopper ").id, "shopper");
  assert.throws(
    () => findProfile(BUILTIN_PROFILES, "retail"),
    (err) => {
      assert.ok(err instanceof UnknownProfileError);
      assert.deepStrictEqual(err.available, ["broker", "shopper", "employer", "platform"]);
      return true;
    }
  );
});
