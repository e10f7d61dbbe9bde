/**
 * Document compiler.
 *
 * Builds the camera and every scene of a parsed document, merges each
 * scene's timeline blocks and compiles the scenes independently: a scene
 * with errors contributes its diagnostics and nothing else, while the other
 * scenes still compile.
 */

import type { ParsedAnimation, ParsedDocument } from '@/types/parse-tree';
import type { Camera } from '@/types/scene';
import type { CompiledScene } from '@/types/timeline';
import { type CompileDiagnostic, SchemaError, TimelineReferenceError } from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import { buildCamera } from '@/features/scene-model/utils/camera';
import { compileScene } from '@/features/timeline/utils/timeline-compiler';
import { parseDocumentTree } from '../schemas/parse-tree-schema';

const log = createLogger('DocumentCompiler');

export interface DocumentCompileResult {
  /** Null when the camera block itself is invalid */
  camera: Camera | null;
  /** Successfully compiled scenes, in document order */
  scenes: CompiledScene[];
  diagnostics: CompileDiagnostic[];
  warnings: string[];
}

/**
 * Collect the animations of every `timeline for` block by scene name,
 * preserving document order across blocks.
 */
function mergeTimelines(
  document: ParsedDocument,
  sceneNames: ReadonlySet<string>,
  diagnostics: CompileDiagnostic[]
): Map<string, ParsedAnimation[]> {
  const merged = new Map<string, ParsedAnimation[]>();

  for (const timeline of document.timelines) {
    if (!sceneNames.has(timeline.scene)) {
      diagnostics.push(
        new TimelineReferenceError(`Timeline targets unknown scene "${timeline.scene}"`, 'UnknownSceneReference', {
          scene: timeline.scene,
        })
      );
      continue;
    }
    const animations = merged.get(timeline.scene) ?? [];
    animations.push(...timeline.animations);
    merged.set(timeline.scene, animations);
  }

  return merged;
}

export function compileDocument(document: ParsedDocument): DocumentCompileResult {
  const diagnostics: CompileDiagnostic[] = [];
  const warnings: string[] = [];

  const camera = buildCamera(document.camera);
  warnings.push(...camera.warnings);
  if (!camera.ok) diagnostics.push(...camera.diagnostics);

  const sceneNames = new Set<string>();
  const uniqueScenes = document.scenes.filter((scene) => {
    if (sceneNames.has(scene.name)) {
      diagnostics.push(
        new SchemaError(`Duplicate scene name "${scene.name}"`, 'DuplicateSceneName', { scene: scene.name })
      );
      return false;
    }
    sceneNames.add(scene.name);
    return true;
  });

  const animationsByScene = mergeTimelines(document, sceneNames, diagnostics);

  const scenes: CompiledScene[] = [];
  for (const scene of uniqueScenes) {
    const result = compileScene(scene, animationsByScene.get(scene.name) ?? []);
    warnings.push(...result.warnings);
    if (result.ok) {
      scenes.push(result.value);
    } else {
      diagnostics.push(...result.diagnostics);
      log.warn(`Scene "${scene.name}" has ${result.diagnostics.length} error(s) and will not render`);
    }
  }

  log.info('Compiled document', {
    scenes: scenes.length,
    failed: uniqueScenes.length - scenes.length,
    diagnostics: diagnostics.length,
  });

  return {
    camera: camera.ok ? camera.value : null,
    scenes,
    diagnostics,
    warnings,
  };
}

/**
 * Validate a JSON parse tree and compile it.
 * @throws ParseTreeError when the tree is structurally invalid
 */
export function compileDocumentTree(data: unknown): DocumentCompileResult {
  return compileDocument(parseDocumentTree(data));
}
