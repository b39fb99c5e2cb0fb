import { AcquisitionError } from "../../camera-pipeline/errors";
import { FfmpegFrameSource, RawFrameAssembler, buildFfmpegArgs } from "../ffmpeg-source";

describe("buildFfmpegArgs", () => {
  it("forces TCP transport for RTSP streams", () => {
    expect(buildFfmpegArgs({ url: "rtsp://cam.local/stream1", width: 640, height: 360, fps: 5 })).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-rtsp_transport",
      "tcp",
      "-i",
      "rtsp://cam.local/stream1",
      "-an",
      "-vf",
      "fps=5,scale=640:360",
      "-f",
      "rawvideo",
      "-pix_fmt",
      "gray",
      "pipe:1",
    ]);
  });

  it("passes files and HTTP URLs straight through", () => {
    const args = buildFfmpegArgs({ url: "./fixtures/lobby.mp4", width: 320, height: 240, fps: 2 });
    expect(args).not.toContain("-rtsp_transport");
    expect(args.slice(3, 5)).toEqual(["-i", "./fixtures/lobby.mp4"]);
  });
});

describe("RawFrameAssembler", () => {
  it("cuts chunks into whole frames and keeps the remainder", () => {
    const assembler = new RawFrameAssembler(4);

    expect(assembler.push(Buffer.from([1, 2, 3]))).toEqual([]);
    expect(assembler.pendingBytes).toBe(3);

    const frames = assembler.push(Buffer.from([4, 5, 6, 7, 8, 9, 10]));
    expect(frames.map((f) => Array.from(f))).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
    ]);
    expect(assembler.pendingBytes).toBe(2);
  });

  it("hands out copies that outlive the chunk", () => {
    const assembler = new RawFrameAssembler(2);
    const chunk = Buffer.from([9, 9]);
    const [frame] = assembler.push(chunk);
    chunk.fill(0);
    expect(Array.from(frame)).toEqual([9, 9]);
  });

  it("drops partial data on reset", () => {
    const assembler = new RawFrameAssembler(4);
    assembler.push(Buffer.from([1, 2]));
    assembler.reset();
    expect(assembler.push(Buffer.from([3, 4, 5, 6])).map((f) => Array.from(f))).toEqual([[3, 4, 5, 6]]);
  });

  it("rejects a non-positive frame size", () => {
    expect(() => new RawFrameAssembler(0)).toThrow("frameBytes must be positive");
  });
});

describe("FfmpegFrameSource", () => {
  it("reports a transient error when read before open", async () => {
    const source = new FfmpegFrameSource({ url: "rtsp://cam.local/stream1", width: 4, height: 4, fps: 1 });
    const read = source.nextFrame(new AbortController().signal);
    await expect(read).rejects.toBeInstanceOf(AcquisitionError);
    await expect(read).rejects.toMatchObject({ fatal: false, message: "source is not open" });
  });

  it("does not spawn when opened with an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new FfmpegFrameSource({ url: "rtsp://cam.local/stream1", width: 4, height: 4, fps: 1 });
    await source.open(controller.signal);
    await expect(source.nextFrame(new AbortController().signal)).rejects.toThrow("source is not open");
    await source.close();
    expect(source.droppedFrames).toBe(0);
  });
});
