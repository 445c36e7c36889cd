import { PackageMap } from "../../loaders/packageMap";
import { LITERAL, parseBody } from "../../../../test/parseHarness";

const sphereCollision = `<collision><geometry><sphere radius="0.25"/></geometry></collision>`;

describe("link parsing", () => {
  it("reads inertia with zero defaults", () => {
    const { builder, collector } = parseBody(
      `<link name="arm"><inertial><origin xyz="0 0 0.5"/><mass value="2"/>` +
        `<inertia ixx="0.1" iyy="0.2" izz="0.3"/></inertial></link>`
    );

    expect(collector.errors).toEqual([]);
    expect(builder.findBody("arm", 2)?.link?.inertial).toEqual({
      origin: { xyz: [0, 0, 0.5], rpy: [0, 0, 0] },
      mass: 2,
      inertia: { ixx: 0.1, iyy: 0.2, izz: 0.3, ixy: 0, ixz: 0, iyz: 0 },
    });
  });

  it("reports a link without a name", () => {
    const { builder, collector } = parseBody(`<link/>`);

    expect(collector.takeError()).toBe(`${LITERAL} error: link tag is missing name attribute.`);
    expect(builder.numBodies).toBe(1);
  });

  it("rejects zero mass with rotational inertia", () => {
    const { builder, collector } = parseBody(
      `<link name="ghost"><inertial><mass value="0"/><inertia ixx="1"/></inertial></link>`
    );

    expect(collector.takeError()).toBe(`${LITERAL} error: Link 'ghost' has zero mass but non-zero rotational inertia.`);
    expect(builder.findBody("ghost")).toBeUndefined();
  });

  it("attaches world link geometry to the world body and ignores its inertia", () => {
    const { builder, collector } = parseBody(
      `<link name="world"><inertial><mass value="1"/></inertial>${sphereCollision}</link>`
    );

    expect(collector.takeWarning()).toBe(
      `${LITERAL} warning: A URDF file declared the "world" link and then attempted to assign mass properties ` +
        `(via the <inertial> tag). Only geometries, <collision> and <visual>, can be assigned to the world link. ` +
        `The <inertial> tag is being ignored.`
    );
    expect(builder.numBodies).toBe(1);
    expect(builder.geometriesOf(0, "collision")).toHaveLength(1);
  });

  it("reports a duplicate link and keeps the first", () => {
    const { builder, collector } = parseBody(`<link name="a"/><link name="a">${sphereCollision}</link>`);

    expect(collector.takeError()).toBe(`${LITERAL} error: Duplicate link name 'a'; only the first declaration is used.`);
    expect(builder.numBodies).toBe(2);
    expect(builder.geometriesOf(1)).toEqual([]);
  });
});

describe("link geometry", () => {
  it("reads every supported shape", () => {
    const { builder, collector } = parseBody(
      `<link name="shapes">` +
        `<collision name="c_box"><origin xyz="1 2 3" rpy="0 0 1"/><geometry><box size="1 2 3"/></geometry></collision>` +
        `<collision><geometry><cylinder radius="0.5" length="2"/></geometry></collision>` +
        `<collision><geometry><mb:capsule radius="0.1" length="0.4"/></geometry></collision>` +
        `<collision><geometry><mb:ellipsoid a="1" b="2" c="3"/></geometry></collision>` +
        `</link>`
    );

    expect(collector.errors).toEqual([]);
    const geometries = builder.geometriesOf(1, "collision").map((record) => record.registration);
    expect(geometries).toEqual([
      {
        role: "collision",
        collision: {
          name: "c_box",
          origin: { xyz: [1, 2, 3], rpy: [0, 0, 1] },
          geometry: { kind: "box", size: [1, 2, 3] },
        },
      },
      {
        role: "collision",
        collision: { origin: { xyz: [0, 0, 0], rpy: [0, 0, 0] }, geometry: { kind: "cylinder", radius: 0.5, length: 2 } },
      },
      {
        role: "collision",
        collision: { origin: { xyz: [0, 0, 0], rpy: [0, 0, 0] }, geometry: { kind: "capsule", radius: 0.1, length: 0.4 } },
      },
      {
        role: "collision",
        collision: { origin: { xyz: [0, 0, 0], rpy: [0, 0, 0] }, geometry: { kind: "ellipsoid", a: 1, b: 2, c: 3 } },
      },
    ]);
  });

  it("resolves mesh filenames through the package map", () => {
    const packageMap = PackageMap.fromEntries({ test_pkg: "/opt/test_pkg" });
    const { builder, collector } = parseBody(
      `<link name="m"><visual><geometry><mesh filename="package://test_pkg/meshes/part.obj" scale="2 2 2"/>` +
        `</geometry></visual></link>`,
      { packageMap }
    );

    expect(collector.errors).toEqual([]);
    const [record] = builder.geometriesOf(1, "visual");
    expect(record.registration).toEqual({
      role: "visual",
      visual: {
        origin: { xyz: [0, 0, 0], rpy: [0, 0, 0] },
        geometry: {
          kind: "mesh",
          filename: "package://test_pkg/meshes/part.obj",
          resolvedPath: "/opt/test_pkg/meshes/part.obj",
          scale: [2, 2, 2],
        },
      },
    });
  });

  it("drops only the geometry whose mesh cannot be resolved", () => {
    const { builder, collector } = parseBody(
      `<link name="m">` +
        `<collision><geometry><mesh filename="package://missing/part.obj"/></geometry></collision>` +
        sphereCollision +
        `</link>`
    );

    expect(collector.takeError()).toBe(
      `${LITERAL} error: Unable to resolve mesh 'package://missing/part.obj' of link 'm': ` +
        `package 'missing' is not in the package map.`
    );
    expect(builder.findBody("m")?.link?.collisions).toHaveLength(1);
  });

  const errorCases: Array<[string, string, string]> = [
    ["a missing <geometry>", `<visual/>`, "A <visual> on link 'l' is missing a <geometry> element."],
    ["an unknown shape", `<collision><geometry><cone/></geometry></collision>`, "The <geometry> of link 'l' has no recognized shape."],
    ["an empty <geometry>", `<collision><geometry/></collision>`, "The <geometry> of link 'l' has no recognized shape."],
    ["a box without size", `<collision><geometry><box/></geometry></collision>`, "Missing required attribute 'size' on <box> of link 'l'."],
    [
      "a short box size",
      `<collision><geometry><box size="1 2"/></geometry></collision>`,
      "Expected 3 values for attribute 'size' of <box>, got '1 2'.",
    ],
    [
      "a sphere with a bad radius",
      `<collision><geometry><sphere radius="big"/></geometry></collision>`,
      "Expected a number for attribute 'radius' of <sphere>, got 'big'.",
    ],
  ];

  it.each(errorCases)("reports %s but keeps the link", (_label, geometry, message) => {
    const { builder, collector } = parseBody(`<link name="l">${geometry}</link>`);

    expect(collector.takeError()).toBe(`${LITERAL} error: ${message}`);
    expect(collector.errors).toEqual([]);
    expect(builder.findBody("l")?.link).toEqual({ name: "l", visuals: [], collisions: [] });
  });
});

describe("materials", () => {
  const black = `<material name="black"><color rgba="0 0 0 1"/></material>`;
  const visualWith = (material: string) =>
    `<link name="l"><visual><geometry><sphere radius="1"/></geometry>${material}</visual></link>`;

  it("applies a named material declared earlier", () => {
    const { builder, collector } = parseBody(black + visualWith(`<material name="black"/>`));

    expect(collector.errors).toEqual([]);
    expect(builder.findBody("l")?.link?.visuals[0].material).toEqual({ name: "black", rgba: [0, 0, 0, 1] });
  });

  it("prefers an inline color", () => {
    const { builder } = parseBody(black + visualWith(`<material name="black"><color rgba="1 0 0 1"/></material>`));

    expect(builder.findBody("l")?.link?.visuals[0].material).toEqual({ name: "black", rgba: [1, 0, 0, 1] });
  });

  it("keeps the visual but drops an undefined material", () => {
    const { builder, collector } = parseBody(visualWith(`<material name="chrome"/>`));

    expect(collector.takeError()).toBe(`${LITERAL} error: Material 'chrome' was used but not defined.`);
    const visual = builder.findBody("l")?.link?.visuals[0];
    expect(visual?.geometry).toEqual({ kind: "sphere", radius: 1 });
    expect(visual?.material).toBeUndefined();
  });

  it("resolves a texture relative to the root directory", () => {
    const { builder, collector } = parseBody(
      `<material name="wood"><texture filename="textures/wood.png"/></material>` + visualWith(`<material name="wood"/>`),
      { rootDir: "/srv/robots" }
    );

    expect(collector.errors).toEqual([]);
    expect(builder.findBody("l")?.link?.visuals[0].material).toEqual({
      name: "wood",
      texture: "/srv/robots/textures/wood.png",
    });
  });

  it("accepts an identical redefinition", () => {
    const { collector } = parseBody(black + black);

    expect(collector.errors).toEqual([]);
  });

  const errorCases: Array<[string, string, string]> = [
    ["a material without name", `<material><color rgba="0 0 0 1"/></material>`, "material tag is missing name attribute."],
    ["a material without appearance", `<material name="plain"/>`, "Material 'plain' has neither a color nor a texture."],
    [
      "a short rgba",
      `<material name="m"><color rgba="0 0 0"/></material>`,
      "Expected 4 values for attribute 'rgba' of <color>, got '0 0 0'.",
    ],
    [
      "a conflicting redefinition",
      black + `<material name="black"><color rgba="0.1 0.1 0.1 1"/></material>`,
      "Material 'black' was multiply defined.",
    ],
  ];

  it.each(errorCases)("reports %s", (_label, body, message) => {
    const { collector } = parseBody(body);

    expect(collector.takeError()).toBe(`${LITERAL} error: ${message}`);
    expect(collector.errors).toEqual([]);
  });
});

describe("frames", () => {
  it("adds a frame posed on its link", () => {
    const { builder, collector } = parseBody(`<link name="a"/><frame name="tool" link="a" xyz="0 0 0.1" rpy="0 1 0"/>`);

    expect(collector.errors).toEqual([]);
    expect(builder.findFrame("tool", 2)).toEqual({
      index: 2,
      instance: 2,
      name: "tool",
      body: 1,
      spec: { name: "tool", link: "a", pose: { xyz: [0, 0, 0.1], rpy: [0, 1, 0] } },
    });
  });

  it("attaches frames to the world", () => {
    const { builder } = parseBody(`<frame name="table" link="world"/>`);

    expect(builder.findFrame("table")?.body).toBe(0);
  });

  const errorCases: Array<[string, string, string]> = [
    ["a frame without name", `<frame link="a"/>`, "Error while parsing frame name."],
    ["a frame without link", `<frame name="f"/>`, "missing link name for frame f."],
    [
      "a frame on an unknown link",
      `<frame name="f" link="b"/>`,
      "Could not find link named 'b' with model instance ID 2 for element 'frame'.",
    ],
    ["a duplicate frame", `<frame name="f" link="a"/><frame name="f" link="a"/>`, "Duplicate frame name 'f'; only the first declaration is used."],
    ["a frame named after a link", `<frame name="a" link="world"/>`, "Frame name 'a' is already used by a link."],
    ["a frame named world", `<frame name="world" link="a"/>`, "Frame name 'world' is already used by a link."],
  ];

  it.each(errorCases)("reports %s", (_label, frames, message) => {
    const { collector } = parseBody(`<link name="a"/>${frames}`);

    expect(collector.takeError()).toBe(`${LITERAL} error: ${message}`);
    expect(collector.errors).toEqual([]);
  });
});
