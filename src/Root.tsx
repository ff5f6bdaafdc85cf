import { Composition, Folder } from "remotion";
import { CircularVisualizer } from "./CircularVisualizer";
import {
  Preview_RotateShuffle,
  Preview_RandomShuffle,
  Preview_AntiStuck,
  Preview_WidebandBeat,
  Preview_Rhythm,
} from "./Previews";

const DURATION = 1800; // 60 seconds at 30fps
const FPS = 30;
const WIDTH = 1920;
const HEIGHT = 1080;

const PREVIEW_DURATION = 450;

export const RemotionRoot: React.FC = () => {
  return (
    <>
      {/* Main composition */}
      <Composition
        id="CircularVisualizer"
        component={CircularVisualizer}
        durationInFrames={DURATION}
        fps={FPS}
        width={WIDTH}
        height={HEIGHT}
      />

      {/* Synthetic 128 BPM track, no audio file needed */}
      <Folder name="Previews">
        <Composition
          id="Preview-RotateShuffle"
          component={Preview_RotateShuffle}
          durationInFrames={PREVIEW_DURATION}
          fps={FPS}
          width={WIDTH}
          height={HEIGHT}
        />
        <Composition
          id="Preview-RandomShuffle"
          component={Preview_RandomShuffle}
          durationInFrames={PREVIEW_DURATION}
          fps={FPS}
          width={WIDTH}
          height={HEIGHT}
        />
        <Composition
          id="Preview-AntiStuck"
          component={Preview_AntiStuck}
          durationInFrames={PREVIEW_DURATION}
          fps={FPS}
          width={WIDTH}
          height={HEIGHT}
        />
        <Composition
          id="Preview-WidebandBeat"
          component={Preview_WidebandBeat}
          durationInFrames={PREVIEW_DURATION}
          fps={FPS}
          width={WIDTH}
          height={HEIGHT}
        />
        <Composition
          id="Preview-Rhythm"
          component={Preview_Rhythm}
          durationInFrames={PREVIEW_DURATION}
          fps={FPS}
          width={WIDTH}
          height={HEIGHT}
        />
      </Folder>
    </>
  );
};
