import { Document, NodeIO } from "@gltf-transform/core";
import type { ExportRequest } from "@outfit-forge/combinator";
import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { GlbAssembler } from "../../src/host/GlbAssembler.js";
import { makeTempDir } from "../helpers.js";

const ARMATURE = ["hips", "spine", "head"];

/** 2×2 RGB PNG */
const PNG = Buffer.from(
  "89504e470d0a1a0a0000000d4948445200000002000000020802000000fdd49a73" +
    "0000001149444154789c63f8cf000420e23f1000001eef05fb486e3fde000000" +
    "0049454e44ae426082",
  "hex",
);

function triangle(document: Document, name: string) {
  const position = document
    .createAccessor()
    .setType("VEC3")
    .setArray(new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]))
    .setBuffer(document.getRoot().listBuffers()[0]);
  const primitive = document.createPrimitive().setAttribute("POSITION", position);
  return document.createMesh(name).addPrimitive(primitive);
}

/**
 * Write a one-triangle part, optionally skinned to a chain of joints
 */
async function writePart(
  file: string,
  meshName: string,
  joints?: readonly string[],
): Promise<void> {
  const document = new Document();
  document.createBuffer();
  const meshNode = document
    .createNode(meshName)
    .setMesh(triangle(document, meshName));
  const scene = document.createScene().addChild(meshNode);

  if (joints && joints.length > 0) {
    const jointNodes = joints.map((name) => document.createNode(name));
    const [rootJoint, ...rest] = jointNodes;
    for (const joint of rest) rootJoint.addChild(joint);
    const skin = document.createSkin(`${meshName}-skin`);
    for (const joint of jointNodes) skin.addJoint(joint);
    meshNode.setSkin(skin);
    scene.addChild(rootJoint);
  }

  document.getRoot().setDefaultScene(scene);
  await fs.ensureDir(path.dirname(file));
  await new NodeIO().write(file, document);
}

/**
 * Write a part as .gltf with its base colour texture in a separate file
 */
async function writeTexturedPart(file: string, meshName: string): Promise<void> {
  const document = new Document();
  document.createBuffer();
  const mesh = triangle(document, meshName);
  const texture = document
    .createTexture(`${meshName}-color`)
    .setImage(PNG)
    .setMimeType("image/png")
    .setURI(`${meshName}-color.png`);
  const material = document
    .createMaterial(`${meshName}-material`)
    .setBaseColorTexture(texture);
  mesh.listPrimitives()[0].setMaterial(material);
  const meshNode = document.createNode(meshName).setMesh(mesh);
  const scene = document.createScene().addChild(meshNode);
  document.getRoot().setDefaultScene(scene);
  await fs.ensureDir(path.dirname(file));
  await new NodeIO().write(file, document);
}

/**
 * Write a part skinned to the standard armature whose hips carry a prop node
 */
async function writePartWithProp(file: string, meshName: string): Promise<void> {
  const document = new Document();
  document.createBuffer();
  const meshNode = document
    .createNode(meshName)
    .setMesh(triangle(document, meshName));
  const joints = ARMATURE.map((name) => document.createNode(name));
  const [hips, ...rest] = joints;
  hips.setTranslation([0, 1, 0]);
  for (const joint of rest) hips.addChild(joint);
  const prop = document
    .createNode("hat")
    .setTranslation([0, 0.5, 0])
    .setMesh(triangle(document, "hat-mesh"));
  hips.addChild(prop);
  const skin = document.createSkin(`${meshName}-skin`);
  for (const joint of joints) skin.addJoint(joint);
  meshNode.setSkin(skin);
  const scene = document.createScene().addChild(meshNode).addChild(hips);
  document.getRoot().setDefaultScene(scene);
  await fs.ensureDir(path.dirname(file));
  await new NodeIO().write(file, document);
}

describe("GlbAssembler", () => {
  let root: string;
  let bodyFile: string;
  let topFile: string;

  beforeEach(async () => {
    root = await makeTempDir();
    bodyFile = path.join(root, "parts", "body", "skin-f-generic-01-v1-body.glb");
    topFile = path.join(root, "parts", "top", "outfit-f-casual-01-v1-top.glb");
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  function request(top = topFile): ExportRequest {
    return {
      name: "set-f-0123456789abcdef",
      skeleton: "f",
      exportDir: path.join(root, "out"),
      fileName: "set-f-0123456789abcdef.glb",
      parts: [
        { category: "top", name: "outfit-f-casual-01-v1-top", source: top },
        { category: "body", name: "skin-f-generic-01-v1-body", source: bodyFile },
      ],
    };
  }

  it("writes one file with every part under the outfit node", async () => {
    await writePart(bodyFile, "body-mesh", ARMATURE);
    await writePart(topFile, "top-mesh", ARMATURE);

    const outcome = await new GlbAssembler().exportCombination(request());

    const outputPath = path.join(root, "out", "set-f-0123456789abcdef.glb");
    expect(outcome).toEqual({ ok: true, path: outputPath });

    const result = await new NodeIO().read(outputPath);
    const scene = result.getRoot().getDefaultScene();
    const [outfit] = scene?.listChildren() ?? [];
    expect(outfit.getName()).toBe("set-f-0123456789abcdef");
    expect(outfit.listChildren().map((child) => child.getName())).toEqual([
      "skin-f-generic-01-v1-body",
      "outfit-f-casual-01-v1-top",
    ]);
    expect(
      result
        .getRoot()
        .listMeshes()
        .map((mesh) => mesh.getName())
        .sort(),
    ).toEqual(["body-mesh", "top-mesh"]);
    expect(result.getRoot().listBuffers()).toHaveLength(1);
  });

  it("re-binds parts rigged to the body armature", async () => {
    await writePart(bodyFile, "body-mesh", ARMATURE);
    await writePart(topFile, "top-mesh", ARMATURE);

    const document = await new GlbAssembler().assemble(request());

    const skins = document.getRoot().listSkins();
    expect(skins).toHaveLength(1);
    expect(skins[0].getName()).toBe("body-mesh-skin");
    const hips = document
      .getRoot()
      .listNodes()
      .filter((node) => node.getName() === "hips");
    expect(hips).toHaveLength(1);
    const skinned = document
      .getRoot()
      .listNodes()
      .filter((node) => node.getMesh() !== null)
      .map((node) => node.getSkin());
    expect(skinned).toEqual([skins[0], skins[0]]);
  });

  it("keeps the own skin of a part rigged differently", async () => {
    await writePart(bodyFile, "body-mesh", ARMATURE);
    await writePart(topFile, "top-mesh", ["hips", "chest"]);

    const document = await new GlbAssembler().assemble(request());

    expect(
      document
        .getRoot()
        .listSkins()
        .map((skin) => skin.getName())
        .sort(),
    ).toEqual(["body-mesh-skin", "top-mesh-skin"]);
  });

  it("embeds textures so the outfit is a single file", async () => {
    const texturedBody = path.join(
      root,
      "parts",
      "body",
      "skin-f-a-01-v1-body.gltf",
    );
    await writeTexturedPart(texturedBody, "body-mesh");
    await writePart(topFile, "top-mesh");
    const outfit: ExportRequest = {
      ...request(),
      parts: [
        { category: "body", name: "skin-f-a-01-v1-body", source: texturedBody },
        { category: "top", name: "outfit-f-casual-01-v1-top", source: topFile },
      ],
    };

    const outcome = await new GlbAssembler().exportCombination(outfit);

    expect(outcome.ok).toBe(true);
    expect(await fs.readdir(path.join(root, "out"))).toEqual([
      "set-f-0123456789abcdef.glb",
    ]);
    const result = await new NodeIO().read(
      path.join(root, "out", "set-f-0123456789abcdef.glb"),
    );
    const [texture] = result.getRoot().listTextures();
    expect(texture.getMimeType()).toBe("image/png");
    expect(Array.from(texture.getImage() ?? [])).toEqual(Array.from(PNG));
  });

  it("keeps the placement of props hung on a discarded joint", async () => {
    await writePart(bodyFile, "body-mesh", ARMATURE);
    await writePartWithProp(topFile, "top-mesh");

    const document = await new GlbAssembler().assemble(request());

    const hats = document
      .getRoot()
      .listNodes()
      .filter((node) => node.getName() === "hat");
    expect(hats).toHaveLength(1);
    expect(hats[0].getParentNode()?.getName()).toBe("outfit-f-casual-01-v1-top");
    const [x, y, z] = hats[0].getWorldTranslation();
    expect(x).toBeCloseTo(0);
    expect(y).toBeCloseTo(1.5);
    expect(z).toBeCloseTo(0);
  });

  it("reports a missing part as a failed export", async () => {
    await writePart(bodyFile, "body-mesh", ARMATURE);

    const outcome = await new GlbAssembler().exportCombination(
      request(path.join(root, "parts", "top", "missing.glb")),
    );

    expect(outcome.ok).toBe(false);
    expect(
      await fs.pathExists(path.join(root, "out", "set-f-0123456789abcdef.glb")),
    ).toBe(false);
  });
});
