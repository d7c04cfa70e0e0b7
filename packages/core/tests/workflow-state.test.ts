import { describe, expect, it } from "vitest";
import { WorkflowState } from "../src/entities/state";

function createState() {
    return WorkflowState.create({
        executionId: "exec-1",
        workflowId: "wf-1",
        data: { items: [1, 2], profile: { name: "ana" } },
        metadata: { tenantId: "t1" }
    });
}

describe("WorkflowState", () => {
    it("starts at version 1 with an empty path and is dirty", () => {
        const state = createState();

        expect(state.version).toBe(1);
        expect(state.stateId).toBe("exec-1_v1");
        expect(state.path).toEqual([]);
        expect(state.currentNode).toBeUndefined();
        expect(state.isDirty()).toBe(true);
    });

    it("derives a copy that shares no structure with its parent", () => {
        const parent = createState();
        parent.recordVisit("A");

        const child = parent.derive();
        child.set("items", [9]);
        child.set("profile", { name: "bia" });
        child.recordVisit("B");
        child.setMeta("tenantId", "t2");

        expect(child.version).toBe(2);
        expect(parent.get("items")).toEqual([1, 2]);
        expect(parent.get("profile")).toEqual({ name: "ana" });
        expect(parent.path).toEqual(["A"]);
        expect(parent.getMeta("tenantId")).toBe("t1");
        expect(child.path).toEqual(["A", "B"]);
    });

    it("hands out copies from get and data", () => {
        const state = createState();

        const items = state.get("items");
        if (Array.isArray(items)) items.push(3);
        const data = state.data;
        data.extra = true;

        expect(state.get("items")).toEqual([1, 2]);
        expect(state.has("extra")).toBe(false);
    });

    it("rejects a derived version that does not move forward", () => {
        const state = createState().derive(5);

        expect(() => state.derive(5)).toThrow(RangeError);
        expect(() => state.derive(4)).toThrow("Derived version 4 must be greater than 5");
        expect(state.derive(9).version).toBe(9);
    });

    it("tracks dirtiness across load, mutation and markClean", () => {
        const loaded = WorkflowState.fromRecord(createState().toRecord());
        expect(loaded.isDirty()).toBe(false);

        loaded.set("x", 1);
        expect(loaded.isDirty()).toBe(true);

        loaded.markClean();
        expect(loaded.delete("missing")).toBe(false);
        expect(loaded.isDirty()).toBe(false);
        loaded.deleteMeta("missing");
        expect(loaded.isDirty()).toBe(false);
    });

    it("records transitions with their reason", () => {
        const state = createState();
        state.recordTransition("A", "B", "highest score");

        expect(state.transitions).toHaveLength(1);
        expect(state.transitions[0]).toMatchObject({ from: "A", to: "B", reason: "highest score" });
        expect(state.toRecord().transitions[0]?.reason).toBe("highest score");
    });
});
