import { resolveFields, type FieldSchemas } from './evented';
import {
  NODE_DEFAULTS,
  NodeBase,
  nodeSchemas,
  type Node,
  type NodeInit,
  type NodeState,
} from './node';

export type SceneState = NodeState;

export type SceneInit = NodeInit;

const sceneSchemas: FieldSchemas<SceneState> = nodeSchemas;

/** Root container of a scene graph. Draws nothing itself. */
export class Scene extends NodeBase<SceneState> {
  get kind(): 'scene' {
    return 'scene';
  }

  constructor(init: SceneInit = {}) {
    const { parent = null, children = [], ...values } = init;
    super(
      sceneSchemas,
      resolveFields(
        'Scene',
        sceneSchemas,
        { ...NODE_DEFAULTS, parent: null, children: [] },
        values
      ),
      parent,
      children
    );
  }

  protected _self(): Node {
    return this;
  }
}
