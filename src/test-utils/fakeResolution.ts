/**
 * 테스트용 타겟 해결 결과
 */

import type { BlenderPlatform, WheelDescriptor } from '../types';
import { createTargetEnvironment, type TargetResolution } from '../core/buildMatrix';
import { getBlenderRelease } from '../core/blender/releases';
import { fakeWheel } from './fakeIndex';

/**
 * 휠마다 의존성 하나를 갖는 해결 결과 생성
 */
export function fakeResolution(
  blenderVersion: string,
  platform: BlenderPlatform,
  wheels: readonly (string | WheelDescriptor)[]
): TargetResolution {
  const release = getBlenderRelease(blenderVersion);
  const target = createTargetEnvironment(release, platform);
  return {
    target,
    release,
    dependencies: wheels.map((input) => {
      const wheel = typeof input === 'string' ? fakeWheel(input) : input;
      return {
        name: wheel.name,
        version: wheel.version,
        requiredBy: ['<project>'],
        wheels: [{ platform, platformTag: target.platformTag, wheel }],
      };
    }),
  };
}
