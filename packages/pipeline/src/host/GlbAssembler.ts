/**
 * GLB Assembler
 *
 * Host side of an export: loads every part of a combination, merges them into
 * one glTF document and writes it as a single binary file with its buffers
 * and textures embedded.
 *
 * Parts rigged to the same armature as the body are re-bound to the body's
 * skin so the result animates with one skeleton. The duplicate joint
 * hierarchies are removed before the document is pruned and its buffers
 * consolidated.
 */

import {
  Document,
  NodeIO,
  Scene,
  Skin,
  type Node,
} from "@gltf-transform/core";
import { ALL_EXTENSIONS } from "@gltf-transform/extensions";
import {
  mergeDocuments,
  prune,
  unpartition,
} from "@gltf-transform/functions";
import {
  BODY_CATEGORY,
  SystemLogger,
  toErrorMessage,
  type ExportRequest,
  type HostExportOutcome,
  type OutfitHost,
  type PartReference,
} from "@outfit-forge/combinator";
import fs from "fs-extra";
import path from "path";

const logger = new SystemLogger("GlbAssembler");

export interface GlbAssemblerOptions {
  /** IO used for reading parts and writing outfits */
  io?: NodeIO;
}

export function jointNames(skin: Skin): string[] {
  return skin.listJoints().map((joint) => joint.getName());
}

export function sameJointNames(a: Skin, b: Skin): boolean {
  const left = jointNames(a);
  const right = jointNames(b);
  return (
    left.length === right.length &&
    left.every((name, index) => name === right[index])
  );
}

/** Body first, the rest in request order */
function bodyFirst(parts: readonly PartReference[]): PartReference[] {
  return [
    ...parts.filter((part) => part.category === BODY_CATEGORY),
    ...parts.filter((part) => part.category !== BODY_CATEGORY),
  ];
}

export class GlbAssembler implements OutfitHost {
  private readonly io: NodeIO;

  constructor(options: GlbAssemblerOptions = {}) {
    this.io = options.io ?? new NodeIO().registerExtensions(ALL_EXTENSIONS);
  }

  async exportCombination(request: ExportRequest): Promise<HostExportOutcome> {
    const outputPath = path.join(request.exportDir, request.fileName);
    try {
      const document = await this.assemble(request);
      const glb = await this.io.writeBinary(document);
      await fs.ensureDir(request.exportDir);
      await fs.writeFile(outputPath, glb);
      logger.debug(`Wrote ${outputPath}`, { parts: request.parts.length });
      return { ok: true, path: outputPath };
    } catch (error) {
      const reason = toErrorMessage(error);
      logger.error(
        `Failed to assemble ${request.name}`,
        error instanceof Error ? error : undefined,
        { outputPath },
      );
      return { ok: false, reason };
    }
  }

  /**
   * Merge the parts of `request` into a single document
   */
  async assemble(request: ExportRequest): Promise<Document> {
    const document = new Document();
    const scene = document.createScene(request.name);
    const outfitNode = document.createNode(request.name);
    scene.addChild(outfitNode);

    let bodySkin: Skin | null = null;

    for (const part of bodyFirst(request.parts)) {
      const source = await this.io.read(part.source);
      const merged = mergeDocuments(document, source);

      const partNode = document.createNode(part.name);
      outfitNode.addChild(partNode);

      for (const sourceScene of source.getRoot().listScenes()) {
        const target = merged.get(sourceScene);
        if (!(target instanceof Scene)) continue;
        for (const child of target.listChildren()) {
          partNode.addChild(child);
        }
        target.dispose();
      }

      const skins: Skin[] = [];
      for (const sourceSkin of source.getRoot().listSkins()) {
        const target = merged.get(sourceSkin);
        if (target instanceof Skin) skins.push(target);
      }

      for (const skin of skins) {
        if (bodySkin === null) {
          if (part.category === BODY_CATEGORY) bodySkin = skin;
          continue;
        }
        if (sameJointNames(skin, bodySkin)) {
          this.rebindSkin(document, skin, bodySkin, partNode);
        } else {
          logger.warn(
            `Skin "${skin.getName()}" of ${part.name} does not match the body armature; keeping its own joints`,
          );
        }
      }
    }

    document.getRoot().setDefaultScene(scene);
    await document.transform(
      prune({ keepSolidTextures: true }),
      unpartition(),
    );
    return document;
  }

  /**
   * Point every node using `from` at `to` and drop `from` with its joints
   */
  private rebindSkin(
    document: Document,
    from: Skin,
    to: Skin,
    partNode: Node,
  ): void {
    for (const node of document.getRoot().listNodes()) {
      if (node.getSkin() === from) node.setSkin(to);
    }

    // Part nodes carry no transform, so a world matrix is also the local
    // matrix under `partNode`
    const joints = new Set(from.listJoints());
    for (const joint of joints) {
      for (const child of joint.listChildren()) {
        if (joints.has(child)) continue;
        child.setMatrix(child.getWorldMatrix());
        partNode.addChild(child);
      }
    }
    for (const joint of joints) joint.dispose();
    from.dispose();
  }
}
