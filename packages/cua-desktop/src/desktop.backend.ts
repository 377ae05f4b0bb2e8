import { DesktopBackend } from '@cua/shared';
import { AccessibilityService } from './accessibility/accessibility.service';
import { ScreenCaptureService } from './capture/screen-capture.service';
import { NutService } from './nut/nut.service';

/**
 * Native backend for the local machine.
 */
export function createDesktopBackend(): DesktopBackend {
  return {
    input: new NutService(),
    capture: new ScreenCaptureService(),
    accessibility: new AccessibilityService(),
  };
}
