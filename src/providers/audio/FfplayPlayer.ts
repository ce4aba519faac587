import type { IAudioPlayer } from './IAudioPlayer';
import { runCommand } from '../../utils/process';

export class FfplayPlayer implements IAudioPlayer {
  constructor(private readonly ffplayPath: string = 'ffplay') {}

  async play(filePath: string): Promise<void> {
    await runCommand(this.ffplayPath, ['-v', '0', '-nodisp', '-autoexit', filePath]);
  }
}
