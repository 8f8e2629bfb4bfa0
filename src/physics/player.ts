import { type Vec3, vec3 } from 'mathcat';
import type { WorldConfig } from '../config';
import type { World } from '../world/world';
import { resolvePenetrations } from './collide';

export type PlayerState = {
    /** eye position */
    position: Vec3;
    velocity: Vec3;
    onGround: boolean;
};

export const createPlayerState = (position: Vec3 = [0, 50, 0]): PlayerState => ({
    position: vec3.clone(position),
    velocity: [0, 0, 0],
    onGround: false,
});

/** Movement keys held during a tick */
export type MovementInput = {
    forward: boolean;
    back: boolean;
    left: boolean;
    right: boolean;
    jump: boolean;
};

export const createMovementInput = (input: Partial<MovementInput> = {}): MovementInput => ({
    forward: false,
    back: false,
    left: false,
    right: false,
    jump: false,
    ...input,
});

export type PlayerConfig = Pick<
    WorldConfig,
    | 'playerRadius'
    | 'wallThickness'
    | 'collisionPasses'
    | 'collisionEpsilon'
    | 'eyeHeight'
    | 'moveSpeed'
    | 'gravity'
    | 'jumpForce'
    | 'terminalVelocity'
    | 'physicsStepSize'
    | 'maxSubSteps'
    | 'minFrameTime'
    | 'maxFrameTime'
>;

/**
 * Horizontal movement direction for the held keys, relative to the camera yaw.
 * Forward is (cos yaw, 0, sin yaw), right is (-sin yaw, 0, cos yaw).
 * @returns `out`, unit length, or zero when no movement key is held or opposite keys cancel
 */
export const computeInputDirection = (out: Vec3, input: MovementInput, yaw: number): Vec3 => {
    const cos = Math.cos(yaw);
    const sin = Math.sin(yaw);

    let x = 0;
    let z = 0;
    if (input.forward) {
        x += cos;
        z += sin;
    }
    if (input.back) {
        x -= cos;
        z -= sin;
    }
    if (input.right) {
        x -= sin;
        z += cos;
    }
    if (input.left) {
        x += sin;
        z -= cos;
    }

    vec3.set(out, x, 0, z);
    if (x * x + z * z > 0) vec3.normalize(out, out);

    return out;
};

const _direction: Vec3 = [0, 0, 0];

/**
 * Advances the player by one frame.
 *
 * Horizontal velocity is replaced by the input each frame, gravity accumulates on the vertical velocity
 * down to the terminal velocity, and a jump is only taken from the ground. The frame time is then
 * integrated in fixed sub-steps, each moving the player, pushing it out of walls and clamping it to the floor.
 * @returns the number of sub-steps taken
 */
export const stepPlayer = <H>(
    world: World<H>,
    player: PlayerState,
    input: MovementInput,
    yaw: number,
    dt: number,
    config: PlayerConfig,
): number => {
    const frameTime = Number.isFinite(dt) ? Math.min(config.maxFrameTime, Math.max(config.minFrameTime, dt)) : config.minFrameTime;
    const { position, velocity } = player;

    /* 1. horizontal velocity from input */
    computeInputDirection(_direction, input, yaw);
    velocity[0] = _direction[0] * config.moveSpeed;
    velocity[2] = _direction[2] * config.moveSpeed;

    /* 2. gravity */
    velocity[1] -= config.gravity * frameTime;
    if (velocity[1] < config.terminalVelocity) velocity[1] = config.terminalVelocity;

    /* 3. jump */
    if (input.jump && player.onGround) {
        velocity[1] = config.jumpForce;
        player.onGround = false;
    }

    /* 4. fixed sub-steps */
    let remaining = frameTime;
    let subSteps = 0;

    while (remaining > 0 && subSteps < config.maxSubSteps) {
        const h = Math.min(config.physicsStepSize, remaining);

        vec3.scaleAndAdd(position, position, velocity, h);

        resolvePenetrations(world, position, velocity, config);

        if (position[1] <= config.eyeHeight) {
            position[1] = config.eyeHeight;
            velocity[1] = 0;
            player.onGround = true;
        } else {
            player.onGround = false;
        }

        remaining -= h;
        subSteps++;
    }

    return subSteps;
};
