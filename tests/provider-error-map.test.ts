import { describe, expect, it } from "vitest";
import { StepUpChallengeError, STEP_UP_MESSAGE } from "../src/core/errors.js";
import { classifyProviderError, providerCodeOf } from "../src/core/services/provider-error-map.js";

describe("provider error classification", () => {
  it("treats MFA codes as step-up", () => {
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [50079], claims: "XYZ" })).toEqual({
      outcome: "step_up",
      providerErrorCode: "AADSTS50079",
      classification: "AdditionalAction"
    });
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [50076] }).outcome).toBe("step_up");
  });

  it("reads the code from the description when error_codes is missing", () => {
    const body = {
      error: "invalid_grant",
      error_description: "AADSTS50076: Due to a configuration change, you must use multi-factor authentication."
    };
    expect(providerCodeOf(body)).toBe(50076);
    expect(classifyProviderError(body)).toEqual({
      outcome: "step_up",
      providerErrorCode: "AADSTS50076",
      classification: "AdditionalAction"
    });
  });

  it("treats gateway misconfiguration codes as fatal", () => {
    expect(classifyProviderError({ error: "invalid_client", error_codes: [7000215] })).toEqual({
      outcome: "fatal",
      providerErrorCode: "AADSTS7000215",
      classification: "None"
    });
    expect(classifyProviderError({ error: "invalid_request", error_codes: [90002] }).outcome).toBe("fatal");
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [53003], claims: "XYZ" }).outcome).toBe("fatal");
  });

  it("maps consent and expiry codes to their classifications", () => {
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [65001] }).classification).toBe("ConsentRequired");
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [50173] }).classification).toBe("TokenExpired");
    expect(classifyProviderError({ error: "invalid_grant", error_codes: [50055] }).classification).toBe("UserPasswordExpired");
  });

  it("falls back to the OAuth error value for unknown codes", () => {
    expect(classifyProviderError({ error: "interaction_required" })).toEqual({
      outcome: "step_up",
      providerErrorCode: "interaction_required",
      classification: "None"
    });
    expect(classifyProviderError({ error: "consent_required" }).classification).toBe("ConsentRequired");
    expect(classifyProviderError({ error: "login_required", error_codes: [12345] })).toEqual({
      outcome: "step_up",
      providerErrorCode: "AADSTS12345",
      classification: "None"
    });
  });

  it("treats invalid_grant with a claims challenge as step-up", () => {
    expect(classifyProviderError({ error: "invalid_grant", claims: '{"access_token":{}}' })).toEqual({
      outcome: "step_up",
      providerErrorCode: "invalid_grant",
      classification: "AdditionalAction"
    });
    expect(classifyProviderError({ error: "invalid_grant" }).outcome).toBe("fatal");
    expect(classifyProviderError({ error: "invalid_grant", claims: "" }).outcome).toBe("fatal");
  });

  it("lets the suberror refine step-up classifications only", () => {
    expect(
      classifyProviderError({ error: "invalid_grant", error_codes: [50079], suberror: "basic_action" }).classification
    ).toBe("BasicAction");
    expect(
      classifyProviderError({ error: "invalid_grant", error_codes: [50079], suberror: "something_new" }).classification
    ).toBe("AdditionalAction");
    expect(
      classifyProviderError({ error: "invalid_client", error_codes: [7000215], suberror: "bad_token" }).classification
    ).toBe("None");
  });

  it("defaults unknown errors to fatal", () => {
    expect(classifyProviderError({ error: "server_error" })).toEqual({
      outcome: "fatal",
      providerErrorCode: "server_error",
      classification: "None"
    });
  });
});

describe("step-up challenge error", () => {
  it("carries the provider details unchanged", () => {
    const claims = '{"access_token":{"capolids":{"essential":true,"values":["c1"]}}}';
    const error = new StepUpChallengeError({
      providerErrorCode: "AADSTS50079",
      claimsChallenge: claims,
      scopes: ["api://dev/.default"],
      correlationId: "corr-1",
      classification: "AdditionalAction"
    });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("StepUpChallengeError");
    expect(error.message).toBe(STEP_UP_MESSAGE);
    expect(error.claimsChallenge).toBe(claims);
    expect(error.scopes).toEqual(["api://dev/.default"]);
    expect(error.correlationId).toBe("corr-1");
  });

  it("keeps an absent claims challenge absent", () => {
    const error = new StepUpChallengeError({
      providerErrorCode: "interaction_required",
      scopes: ["api://dev/.default"],
      classification: "None"
    });
    expect(error.claimsChallenge).toBeUndefined();
    expect(error.correlationId).toBeUndefined();
  });

  it("rejects an empty scope list", () => {
    expect(
      () =>
        new StepUpChallengeError({
          providerErrorCode: "AADSTS50079",
          claimsChallenge: "XYZ",
          scopes: [],
          classification: "AdditionalAction"
        })
    ).toThrow(TypeError);
  });

  it("does not share the caller's scope array", () => {
    const scopes = ["api://dev/.default"];
    const error = new StepUpChallengeError({ providerErrorCode: "AADSTS50079", scopes, classification: "AdditionalAction" });
    scopes.push("offline_access");
    expect(error.scopes).toEqual(["api://dev/.default"]);
    expect(Object.isFrozen(error.scopes)).toBe(true);
  });
});
