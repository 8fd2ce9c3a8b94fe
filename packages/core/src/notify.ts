import { execFileSync } from 'child_process';

/** Desktop notification via osascript (macOS) or notify-send (Linux). Returns false when neither worked. */
export function sendDesktopNotification(title: string, body: string, sound = true): boolean {
  const short = body.length > 200 ? body.substring(0, 197) + '...' : body;
  const oneLine = short.replace(/\n/g, ' ');
  try {
    if (process.platform === 'darwin') {
      const escaped = oneLine.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
      const soundPart = sound ? ' sound name "default"' : '';
      execFileSync('osascript', ['-e', `display notification "${escaped}" with title "${title}"${soundPart}`], { stdio: 'ignore' });
    } else {
      execFileSync('notify-send', [title, oneLine], { stdio: 'ignore' });
    }
    return true;
  } catch {
    return false;
  }
}

export function ringBell(): void {
  process.stdout.write('\x07');
}
