import { type Mat4, mat4, type Vec3 } from 'mathcat';
import type { WorldConfig } from '../config';

/** Largest pitch magnitude, just short of straight up or down */
export const MAX_PITCH = 1.5;

export const DEFAULT_MOUSE_SENSITIVITY = 0.003;

/** First person camera orientation. The eye position is the player's */
export type Camera = {
    /** radians around +y, 0 looks along +x */
    yaw: number;

    /** radians, positive looks up */
    pitch: number;

    /** viewport width / height */
    aspect: number;

    /** spawn eye position */
    spawn: Vec3;
};

export const createCamera = (aspect: number): Camera => ({
    yaw: -Math.PI / 2,
    pitch: 0,
    aspect,
    spawn: [0, 50, 0],
});

/**
 * Turns the camera by a mouse delta in pixels. Pitch is clamped to ±MAX_PITCH.
 */
export const rotateCamera = (camera: Camera, dx: number, dy: number, sensitivity = DEFAULT_MOUSE_SENSITIVITY): void => {
    camera.yaw += dx * sensitivity;
    camera.pitch -= dy * sensitivity;
    if (camera.pitch > MAX_PITCH) camera.pitch = MAX_PITCH;
    if (camera.pitch < -MAX_PITCH) camera.pitch = -MAX_PITCH;
};

/** Unit view direction of a camera */
export const getForward = (out: Vec3, camera: Camera): Vec3 => {
    const cosPitch = Math.cos(camera.pitch);
    out[0] = Math.cos(camera.yaw) * cosPitch;
    out[1] = Math.sin(camera.pitch);
    out[2] = Math.sin(camera.yaw) * cosPitch;
    return out;
};

const UP: Vec3 = [0, 1, 0];

const _forward: Vec3 = [0, 0, 0];
const _center: Vec3 = [0, 0, 0];
const _view = mat4.create();
const _projection = mat4.create();

/**
 * Column major view projection matrix of a camera at an eye position
 */
export const getViewProjection = (
    out: Mat4,
    camera: Camera,
    eye: Vec3,
    config: Pick<WorldConfig, 'fovY' | 'zNear' | 'zFar'>,
): Mat4 => {
    getForward(_forward, camera);
    _center[0] = eye[0] + _forward[0];
    _center[1] = eye[1] + _forward[1];
    _center[2] = eye[2] + _forward[2];

    mat4.lookAt(_view, eye, _center, UP);
    mat4.perspectiveNO(_projection, (config.fovY * Math.PI) / 180, camera.aspect, config.zNear, config.zFar);

    return mat4.multiply(out, _projection, _view);
};
