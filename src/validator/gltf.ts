/**
 * glTF 2.0 polygon counting for item artifacts.
 *
 * Accepts a binary container (.glb, JSON chunk first) or a plain .gltf JSON
 * document. Only the scene graph and index accessors are read; buffers are
 * never decoded.
 */

import { z } from "zod";

const GLB_MAGIC = 0x46546c67; // "glTF"
const GLB_VERSION = 2;
const GLB_HEADER_BYTES = 12;
const GLB_CHUNK_HEADER_BYTES = 8;
const CHUNK_TYPE_JSON = 0x4e4f534a; // "JSON"

export const PRIMITIVE_MODE = {
  TRIANGLES: 4,
  TRIANGLE_STRIP: 5,
  TRIANGLE_FAN: 6,
} as const;

export class GltfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GltfError";
  }
}

const index = z.number().int().nonnegative();

const gltfSchema = z
  .object({
    scene: index.optional(),
    scenes: z.array(z.object({ nodes: z.array(index).default([]) }).passthrough()).min(1),
    nodes: z
      .array(z.object({ mesh: index.optional(), children: z.array(index).default([]) }).passthrough())
      .default([]),
    meshes: z
      .array(
        z
          .object({
            primitives: z.array(
              z.object({ indices: index.optional(), mode: z.number().int().default(PRIMITIVE_MODE.TRIANGLES) }).passthrough()
            ),
          })
          .passthrough()
      )
      .default([]),
    accessors: z.array(z.object({ count: index }).passthrough()).default([]),
  })
  .passthrough();

type GltfDocument = z.infer<typeof gltfSchema>;

export function isGlb(bytes: Uint8Array): boolean {
  if (bytes.length < GLB_HEADER_BYTES) return false;
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true) === GLB_MAGIC;
}

/**
 * The JSON text of a glTF asset, from a .glb container or a .gltf file.
 */
function extractJsonText(bytes: Uint8Array): string {
  if (!isGlb(bytes)) {
    return decodeUtf8(bytes);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint32(4, true);
  if (version !== GLB_VERSION) {
    throw new GltfError(`unsupported GLB version ${version}`);
  }
  const declaredLength = view.getUint32(8, true);
  if (declaredLength > bytes.length) {
    throw new GltfError(`GLB declares ${declaredLength} bytes but has ${bytes.length}`);
  }
  if (bytes.length < GLB_HEADER_BYTES + GLB_CHUNK_HEADER_BYTES) {
    throw new GltfError("GLB has no chunks");
  }

  const chunkLength = view.getUint32(GLB_HEADER_BYTES, true);
  const chunkType = view.getUint32(GLB_HEADER_BYTES + 4, true);
  if (chunkType !== CHUNK_TYPE_JSON) {
    throw new GltfError("first GLB chunk is not JSON");
  }
  const start = GLB_HEADER_BYTES + GLB_CHUNK_HEADER_BYTES;
  if (start + chunkLength > bytes.length) {
    throw new GltfError("JSON chunk runs past the end of the file");
  }
  return decodeUtf8(bytes.subarray(start, start + chunkLength));
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new GltfError("glTF JSON is not valid UTF-8");
  }
}

export function parseGltf(bytes: Uint8Array): GltfDocument {
  const text = extractJsonText(bytes);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new GltfError(`glTF JSON does not parse: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = gltfSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new GltfError(`glTF ${issue ? `${issue.path.join(".")}: ${issue.message}` : "is malformed"}`);
  }
  return result.data;
}

function primitivePolygons(mode: number, indexCount: number): number {
  switch (mode) {
    case PRIMITIVE_MODE.TRIANGLES:
      return Math.floor(indexCount / 3);
    case PRIMITIVE_MODE.TRIANGLE_STRIP:
      return Math.max(0, indexCount - 2);
    case PRIMITIVE_MODE.TRIANGLE_FAN:
      return Math.max(0, indexCount - 1);
    default:
      // Points and lines have no faces
      return 0;
  }
}

/**
 * Count indexed triangles reachable from the default scene (or the first one).
 * Non-indexed primitives are not counted.
 */
export function countPolygons(bytes: Uint8Array): number {
  const doc = parseGltf(bytes);

  const sceneIndex = doc.scene ?? 0;
  const scene = doc.scenes[sceneIndex];
  if (!scene) {
    throw new GltfError(`scene ${sceneIndex} does not exist`);
  }

  const visiting = new Set<number>();

  const countNode = (nodeIndex: number): number => {
    const node = doc.nodes[nodeIndex];
    if (!node) {
      throw new GltfError(`node ${nodeIndex} does not exist`);
    }
    if (visiting.has(nodeIndex)) {
      throw new GltfError(`node ${nodeIndex} is its own ancestor`);
    }
    visiting.add(nodeIndex);

    let polygons = 0;
    if (node.mesh !== undefined) {
      const mesh = doc.meshes[node.mesh];
      if (!mesh) {
        throw new GltfError(`mesh ${node.mesh} does not exist`);
      }
      for (const primitive of mesh.primitives) {
        if (primitive.indices === undefined) continue;
        const accessor = doc.accessors[primitive.indices];
        if (!accessor) {
          throw new GltfError(`accessor ${primitive.indices} does not exist`);
        }
        polygons += primitivePolygons(primitive.mode, accessor.count);
      }
    }

    for (const child of node.children) {
      polygons += countNode(child);
    }

    visiting.delete(nodeIndex);
    return polygons;
  };

  let total = 0;
  for (const nodeIndex of scene.nodes) {
    total += countNode(nodeIndex);
  }
  return total;
}
