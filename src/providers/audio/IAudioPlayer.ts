export interface IAudioPlayer {
  play(filePath: string): Promise<void>;
}
