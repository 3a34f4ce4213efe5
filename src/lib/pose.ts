export type Pose3D = {
  frameId: string
  x: number
  y: number
  z: number
  qx: number
  qy: number
  qz: number
  qw: number
  /** Yaw about +Z (ROS convention), radians */
  yawZ: number
}

export type Quaternion = [x: number, y: number, z: number, w: number]

export function yawFromQuaternionZUp(qx: number, qy: number, qz: number, qw: number): number {
  // ROS REP-103 yaw about +Z. Standard quaternion->yaw conversion.
  const siny = 2 * (qw * qz + qx * qy)
  const cosy = 1 - 2 * (qy * qy + qz * qz)
  return Math.atan2(siny, cosy)
}

/** Static-axes roll/pitch/yaw, same convention as tf `quaternion_from_euler`. */
export function quaternionFromEuler(roll: number, pitch: number, yaw: number): Quaternion {
  const ci = Math.cos(roll / 2)
  const si = Math.sin(roll / 2)
  const cj = Math.cos(pitch / 2)
  const sj = Math.sin(pitch / 2)
  const ck = Math.cos(yaw / 2)
  const sk = Math.sin(yaw / 2)

  const cc = ci * ck
  const cs = ci * sk
  const sc = si * ck
  const ss = si * sk

  const q: Quaternion = [
    cj * sc - sj * cs,
    cj * ss + sj * cc,
    cj * cs - sj * sc,
    cj * cc + sj * ss,
  ]

  const norm = Math.hypot(...q)
  return norm > 0 ? [q[0] / norm, q[1] / norm, q[2] / norm, q[3] / norm] : [0, 0, 0, 1]
}

export function eulerFromQuaternion(
  qx: number,
  qy: number,
  qz: number,
  qw: number,
): [roll: number, pitch: number, yaw: number] {
  const roll = Math.atan2(2 * (qw * qx + qy * qz), 1 - 2 * (qx * qx + qy * qy))
  const sinp = Math.min(1, Math.max(-1, 2 * (qw * qy - qz * qx)))
  const pitch = Math.asin(sinp)
  return [roll, pitch, yawFromQuaternionZUp(qx, qy, qz, qw)]
}

export function createPose(
  frameId: string,
  x: number,
  y: number,
  z: number,
  roll: number,
  pitch: number,
  yaw: number,
): Pose3D {
  const [qx, qy, qz, qw] = quaternionFromEuler(roll, pitch, yaw)
  return {
    frameId,
    x,
    y,
    z,
    qx,
    qy,
    qz,
    qw,
    yawZ: yawFromQuaternionZUp(qx, qy, qz, qw),
  }
}

export function planarDistance(
  a: { x: number; y: number },
  b: { x: number; y: number },
): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}
