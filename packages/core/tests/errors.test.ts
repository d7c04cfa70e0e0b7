import { describe, expect, it } from "vitest";
import {
    GraphCycleError,
    NodeTimeoutError,
    PersistenceError,
    WeaveError,
    serializeError
} from "../src/errors";

describe("errors", () => {
    it("names the cycle members in order", () => {
        const error = new GraphCycleError(["A", "B", "A"]);

        expect(error.code).toBe("graph_cycle");
        expect(error.message).toBe("Workflow graph contains a cycle: A -> B -> A");
        expect(error.cycle).toEqual(["A", "B", "A"]);
    });

    it("gives node timeouts their own code", () => {
        const error = new NodeTimeoutError("fetch", 50);

        expect(error).toBeInstanceOf(WeaveError);
        expect(error.code).toBe("node_timeout");
        expect(error.nodeId).toBe("fetch");
        expect(error.message).toBe("Node 'fetch' timed out after 50ms");
    });

    it("keeps the cause of persistence failures", () => {
        const cause = new Error("disk full");
        const error = new PersistenceError("saveState", cause);

        expect(error.message).toBe("Persistence operation 'saveState' failed: disk full");
        expect(error.cause).toBe(cause);
    });

    it("serializes engine and foreign errors", () => {
        expect(serializeError(new PersistenceError("get", "offline"))).toEqual({
            code: "persistence_failed",
            message: "Persistence operation 'get' failed: offline"
        });
        expect(serializeError(new Error("boom"))).toEqual({ code: "internal", message: "boom" });
        expect(serializeError("plain")).toEqual({ code: "internal", message: "plain" });
    });
});
