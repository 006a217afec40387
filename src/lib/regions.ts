// Region names, blend order and MediaPipe FaceMesh (468-point) indices used to
// turn a dense mesh into the named landmark set the compositor works with.

export const REGION_NAMES = ['face', 'left_eye', 'right_eye', 'nose', 'mouth'] as const;
export type RegionName = (typeof REGION_NAMES)[number];

// Coarse first so the finer features are painted last and never covered.
export const BLEND_ORDER: readonly RegionName[] = ['face', 'nose', 'mouth', 'left_eye', 'right_eye'];

export const LANDMARK_NAMES = [
  'left_eye_center',
  'left_eye_outer',
  'left_eye_inner',
  'left_eye_top',
  'left_eye_bottom',
  'right_eye_center',
  'right_eye_inner',
  'right_eye_outer',
  'right_eye_top',
  'right_eye_bottom',
  'nose_bridge',
  'nose_tip',
  'nose_left',
  'nose_right',
  'mouth_left',
  'mouth_right',
  'mouth_top',
  'mouth_bottom',
  'chin',
  'left_cheek',
  'right_cheek',
] as const;
export type LandmarkName = (typeof LANDMARK_NAMES)[number];

// Image-space left/right: "left" is the side with the smaller x.
// Eye centers are derived from their ring points, so they are absent here.
export const MESH_LANDMARKS: ReadonlyArray<readonly [LandmarkName, number]> = [
  ['left_eye_outer', 33],
  ['left_eye_inner', 133],
  ['left_eye_top', 159],
  ['left_eye_bottom', 145],
  ['right_eye_inner', 362],
  ['right_eye_outer', 263],
  ['right_eye_top', 386],
  ['right_eye_bottom', 374],
  ['nose_bridge', 6],
  ['nose_tip', 1],
  ['nose_left', 98],
  ['nose_right', 327],
  ['mouth_left', 61],
  ['mouth_right', 291],
  ['mouth_top', 0],
  ['mouth_bottom', 17],
  ['chin', 152],
  ['left_cheek', 234],
  ['right_cheek', 454],
];

// Minimal subsets to locate eye centers (left/right)
export const LEFT_EYE_CENTER_INDICES = [33, 133, 159, 145];
export const RIGHT_EYE_CENTER_INDICES = [362, 263, 386, 374];

// Face oval, clockwise from the top of the forehead.
export const FACE_OVAL_INDICES = [
  10, 338, 297, 332, 284, 251, 389, 356, 454, 323, 361, 288,
  397, 365, 379, 378, 400, 377, 152, 148, 176, 149, 150, 136,
  172, 58, 132, 93, 234, 127, 162, 21, 54, 103, 67, 109,
];

export const FACE_OUTLINE_SIZE = FACE_OVAL_INDICES.length;

// Anchors used when a template does not declare its own.
export const DEFAULT_REGION_ANCHORS: Record<RegionName, LandmarkName[]> = {
  face: ['left_eye_center', 'right_eye_center', 'nose_tip', 'mouth_left', 'mouth_right', 'chin'],
  left_eye: ['left_eye_outer', 'left_eye_inner', 'left_eye_top', 'left_eye_bottom'],
  right_eye: ['right_eye_inner', 'right_eye_outer', 'right_eye_top', 'right_eye_bottom'],
  nose: ['nose_bridge', 'nose_tip', 'nose_left', 'nose_right'],
  mouth: ['mouth_left', 'mouth_right', 'mouth_top', 'mouth_bottom'],
};
