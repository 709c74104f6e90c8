import {
  ConfigurationError,
  HcrError,
  PlanningCancelledError,
  PlanningFailureError,
  RefinementFailureError,
  SolverError,
} from "../errors";

describe("errors – attribution", () => {
  it("appends the problem instance to the message", () => {
    const error = new SolverError("timeout", "no answer within 10 ms", {
      level: 2,
      partial: 3,
      range: { first: 4, last: 6 },
    });
    expect(error.message).toBe("Solver timeout: no answer within 10 ms [level 2, partial 3, stages 4..6]");
    expect(error.name).toBe("SolverError");
    expect(error).toBeInstanceOf(HcrError);
  });

  it("omits the attribution when there is none", () => {
    expect(new PlanningCancelledError().message).toBe("Planning was cancelled");
  });

  it("keeps the failure that prevented a refinement", () => {
    const cause = new PlanningFailureError("length-cap", 12, { level: 1 });
    const error = new RefinementFailureError({ level: 1, partial: 2 }, cause);

    expect(cause.message).toBe("No plan found within the length limit (bound 12) [level 1]");
    expect(error.message).toBe("Cannot refine the parent plan: length-cap [level 1, partial 2]");
    expect(error.cause).toBe(cause);
  });

  it("joins configuration issues", () => {
    const error = new ConfigurationError(["a: bad", "b: worse"]);
    expect(error.message).toBe("Invalid configuration: a: bad; b: worse");
    expect(error.issues).toEqual(["a: bad", "b: worse"]);
  });
});
