import { fixturePath, LITERAL, parseBody, parseFixture, robotXml, parseText } from "../../../../test/parseHarness";

const TWO_LINKS = `<link name="a"/><link name="b"/>`;

describe("joint parsing from a file", () => {
  const file = fixturePath("joint_parsing_test.urdf");

  it("commits every supported joint and warns about friction and floating joints", () => {
    const { model, builder, collector } = parseFixture("joint_parsing_test.urdf");

    expect(model).toBe(2);
    expect(builder.modelInstanceName(2)).toBe("joint_parsing_test");
    expect(builder.numJoints).toBe(8);
    expect(collector.errors).toEqual([]);
    expect(collector.takeWarning()).toBe(
      `${file}:26: warning: Joint 'prismatic_joint': joint friction is not supported by the model builder; the value 10 is ignored.`
    );
    expect(collector.takeWarning()).toBe(
      `${file}:58: warning: Joint 'floating_joint' specified as type floating which is not supported by the model builder.  Leaving 'link9' as a free body.`
    );
    expect(collector.warnings).toEqual([]);
    expect(builder.findJoint("floating_joint")).toBeUndefined();
  });

  it("reads revolute limits, acceleration, damping and origin", () => {
    const { builder } = parseFixture("joint_parsing_test.urdf");
    const joint = builder.findJoint("revolute_joint", 2);

    expect(joint?.bodies).toEqual({ parent: 1, child: 2 });
    expect(joint?.spec).toEqual({
      type: "revolute",
      name: "revolute_joint",
      parent: "base",
      child: "link1",
      origin: { xyz: [1, 0, 0], rpy: [0, 0, 0] },
      axis: [0, 0, 1],
      damping: 0.1,
      effortLimit: 100,
      limits: {
        position: { lower: [-1], upper: [2] },
        velocity: { lower: [-100], upper: [100] },
        acceleration: { lower: [-200], upper: [200] },
      },
    });
  });

  it("normalizes the prismatic axis", () => {
    const { builder } = parseFixture("joint_parsing_test.urdf");
    const spec = builder.findJoint("prismatic_joint")?.spec;

    expect(spec?.type).toBe("prismatic");
    if (spec?.type !== "prismatic") return;
    expect(spec.axis).toEqual([0, 0, 1]);
    expect(spec.limits.velocity).toEqual({ lower: [-5], upper: [5] });
    expect(spec.limits.acceleration).toEqual({ lower: [-10], upper: [10] });
  });

  it("defaults every bound to infinity when <limit> is absent", () => {
    const { builder } = parseFixture("joint_parsing_test.urdf");
    const spec = builder.findJoint("revolute_joint_no_limits")?.spec;

    expect(spec).toMatchObject({
      axis: [0, 1, 0],
      damping: 0,
      effortLimit: Infinity,
      limits: {
        position: { lower: [-Infinity], upper: [Infinity] },
        velocity: { lower: [-Infinity], upper: [Infinity] },
        acceleration: { lower: [-Infinity], upper: [Infinity] },
      },
    });
  });

  it("keeps continuous joints unbounded in position but honours velocity", () => {
    const { builder } = parseFixture("joint_parsing_test.urdf");
    const spec = builder.findJoint("continuous_joint")?.spec;

    expect(spec).toMatchObject({
      type: "continuous",
      axis: [1, 0, 0],
      effortLimit: 7,
      limits: {
        position: { lower: [-Infinity], upper: [Infinity] },
        velocity: { lower: [-3], upper: [3] },
      },
    });
  });

  it("builds fixed, planar, ball and universal joints", () => {
    const { builder } = parseFixture("joint_parsing_test.urdf");

    expect(builder.findJoint("fixed_joint")?.spec).toEqual({
      type: "fixed",
      name: "fixed_joint",
      parent: "link4",
      child: "link5",
      origin: { xyz: [0, 0, 0], rpy: [0, 0, 0] },
      effortLimit: Infinity,
    });
    expect(builder.findJoint("planar_joint")?.spec).toMatchObject({
      type: "planar",
      axis: [0, 0, 1],
      damping: [0.1, 0.1, 0.1],
      limits: { position: { lower: [-Infinity, -Infinity, -Infinity], upper: [Infinity, Infinity, Infinity] } },
    });
    expect(builder.findJoint("ball_joint")?.spec).toMatchObject({
      type: "ball",
      damping: 0.1,
      limits: { velocity: { lower: [-Infinity, -Infinity, -Infinity], upper: [Infinity, Infinity, Infinity] } },
    });
    expect(builder.findJoint("universal_joint")?.spec).toMatchObject({
      type: "universal",
      damping: 0.1,
      limits: { acceleration: { lower: [-Infinity, -Infinity], upper: [Infinity, Infinity] } },
    });
  });
});

describe("joint diagnostics", () => {
  const cases: Array<[string, string, string]> = [
    [
      "a missing name",
      `<joint type="revolute"><parent link="a"/><child link="b"/></joint>`,
      "joint tag is missing name attribute.",
    ],
    [
      "a missing type",
      `<joint name="j"><parent link="a"/><child link="b"/></joint>`,
      "joint 'j' is missing type attribute.",
    ],
    [
      "an unknown type",
      `<joint name="j" type="screw"><parent link="a"/><child link="b"/></joint>`,
      "Joint 'j' has unrecognized type: 'screw'",
    ],
    [
      "a standard type under the vendor tag",
      `<mb:joint name="j" type="revolute"><parent link="a"/><child link="b"/></mb:joint>`,
      "Joint j of type revolute is a standard joint type, and should be a <joint>",
    ],
    [
      "a custom type under <joint>",
      `<joint name="j" type="ball"><parent link="a"/><child link="b"/></joint>`,
      "Joint j of type ball is a custom joint type, and should be a <mb:joint>",
    ],
    ["a missing parent", `<joint name="j" type="fixed"><child link="b"/></joint>`, "joint 'j' doesn't have a parent node!"],
    [
      "a parent without link",
      `<joint name="j" type="fixed"><parent/><child link="b"/></joint>`,
      "joint j's parent does not have a link attribute!",
    ],
    ["a missing child", `<joint name="j" type="fixed"><parent link="a"/></joint>`, "joint 'j' doesn't have a child node!"],
    [
      "a child without link",
      `<joint name="j" type="fixed"><parent link="a"/><child/></joint>`,
      "joint j's child does not have a link attribute!",
    ],
    [
      "an unknown link",
      `<joint name="j" type="fixed"><parent link="nowhere"/><child link="b"/></joint>`,
      "Could not find link named 'nowhere' with model instance ID 2 for element 'joint'.",
    ],
    [
      "a zero axis",
      `<joint name="j" type="revolute"><parent link="a"/><child link="b"/><axis xyz="0 0 0"/></joint>`,
      "Joint 'j' axis is zero.  Don't do that.",
    ],
    [
      "an unparsable limit",
      `<joint name="j" type="revolute"><parent link="a"/><child link="b"/><limit lower="abc"/></joint>`,
      "Expected a number for attribute 'lower' of <limit>, got 'abc'.",
    ],
    [
      "a short axis",
      `<joint name="j" type="revolute"><parent link="a"/><child link="b"/><axis xyz="0 1"/></joint>`,
      "Expected 3 values for attribute 'xyz' of <axis>, got '0 1'.",
    ],
  ];

  it.each(cases)("reports %s and drops the joint", (_label, joint, message) => {
    const { model, builder, collector } = parseBody(TWO_LINKS + joint);

    expect(model).toBe(2);
    expect(collector.takeError()).toBe(`${LITERAL} error: ${message}`);
    expect(collector.errors).toEqual([]);
    expect(builder.numJoints).toBe(0);
  });

  it("keeps parsing siblings after a bad joint", () => {
    const { builder, collector } = parseBody(
      TWO_LINKS +
        `<link name="c"/>` +
        `<joint name="bad" type="revolute"><parent link="a"/><child link="b"/><axis xyz="0 0 0"/></joint>` +
        `<joint name="good" type="revolute"><parent link="a"/><child link="c"/></joint>`
    );

    expect(collector.errors).toHaveLength(1);
    expect(builder.findJoint("bad")).toBeUndefined();
    expect(builder.findJoint("good")?.bodies).toEqual({ parent: 1, child: 3 });
  });

  it("warns about coulomb_window and ignores zero friction", () => {
    const { builder, collector } = parseBody(
      TWO_LINKS +
        `<joint name="j" type="revolute"><parent link="a"/><child link="b"/>` +
        `<dynamics damping="0.5" friction="0" coulomb_window="0.01"/></joint>`
    );

    expect(collector.takeWarning()).toBe(
      `${LITERAL} warning: Joint 'j': 'coulomb_window' is not supported by the model builder and is ignored.`
    );
    expect(collector.warnings).toEqual([]);
    expect(builder.findJoint("j")?.spec).toMatchObject({ damping: 0.5 });
  });

  it("reports a duplicate joint name and keeps the first", () => {
    const { builder, collector } = parseBody(
      TWO_LINKS +
        `<link name="c"/>` +
        `<joint name="j" type="fixed"><parent link="a"/><child link="b"/></joint>` +
        `<joint name="j" type="fixed"><parent link="a"/><child link="c"/></joint>`
    );

    expect(collector.takeError()).toBe(`${LITERAL} error: Duplicate joint name 'j'; only the first declaration is used.`);
    expect(builder.numJoints).toBe(1);
    expect(builder.findJoint("j")?.spec.child).toBe("b");
  });

  it("resolves the world link without a declaration", () => {
    const { builder, collector } = parseBody(
      `<link name="a"/><joint name="weld" type="fixed"><parent link="world"/><child link="a"/></joint>`
    );

    expect(collector.errors).toEqual([]);
    expect(builder.findJoint("weld")?.bodies).toEqual({ parent: 0, child: 1 });
  });

  it("does not resolve a link declared after the joint", () => {
    const { builder, collector } = parseBody(
      `<link name="a"/><joint name="j" type="fixed"><parent link="a"/><child link="late"/></joint><link name="late"/>`
    );

    expect(collector.takeError()).toBe(
      `${LITERAL} error: Could not find link named 'late' with model instance ID 2 for element 'joint'.`
    );
    expect(builder.numJoints).toBe(0);
    expect(builder.findBody("late")?.index).toBe(2);
  });

  it("follows a custom vendor prefix", () => {
    const text = robotXml(
      TWO_LINKS + `<acme:joint name="ball" type="ball"><parent link="a"/><child link="b"/></acme:joint>`,
      "custom_prefix",
      "acme"
    );
    const { builder, collector } = parseText(text, { vendorPrefix: "acme" });

    expect(collector.errors).toEqual([]);
    expect(builder.findJoint("ball")?.spec.type).toBe("ball");
  });
});
