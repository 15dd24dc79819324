/** The 100x50x5 mm plate: sketch, rectangle, extrude. */
export function platePlan(overrides: { planId?: string; distance?: unknown; op3Dependencies?: string[] } = {}): Record<string, unknown> {
  return {
    plan_id: overrides.planId ?? "plate_001",
    metadata: {
      natural_language_prompt: "Create a 100x50mm plate that's 5mm thick",
      confidence_score: 0.95,
      units: "mm",
    },
    operations: [
      { op_id: "op1", op: "create_sketch", params: { plane: "XY", name: "s1" } },
      {
        op_id: "op2",
        op: "draw_rectangle",
        params: {
          center_point: { x: 0, y: 0 },
          width: { value: 100, unit: "mm" },
          height: { value: 50, unit: "mm" },
        },
        target_ref: "s1",
        dependencies: ["op1"],
      },
      {
        op_id: "op3",
        op: "extrude",
        params: { profile: "s1", distance: overrides.distance ?? { value: 5, unit: "mm" } },
        dependencies: overrides.op3Dependencies ?? ["op2"],
      },
    ],
  };
}

/** Sketch with only a line, so the extrude has no closed profile. */
export function openProfilePlan(): Record<string, unknown> {
  return {
    plan_id: "open_profile",
    metadata: { units: "mm" },
    operations: [
      { op_id: "op1", op: "create_sketch", params: { plane: "XY", name: "s1" } },
      {
        op_id: "op2",
        op: "draw_line",
        params: { start_point: { x: 0, y: 0 }, end_point: { x: 10, y: 0 } },
        target_ref: "s1",
      },
      { op_id: "op3", op: "extrude", params: { profile: "s1", distance: 5 } },
    ],
  };
}

/** One hole drilled into an entity the caller selects as "plate". */
export function holePlan(): Record<string, unknown> {
  return {
    plan_id: "holes",
    metadata: { units: "mm" },
    operations: [{ op_id: "h1", op: "create_hole", params: { diameter: 6, depth: 5, name: "h1_hole" }, target_ref: "plate" }],
  };
}
