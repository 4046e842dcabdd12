import { buildChannels, PrimaryPlatformChannel, SecondaryPlatformChannel } from "../channels";
import { makePrimary, makeSecondary, ScriptedPublisher } from "../../__tests__/helpers/fakes";

const metadata = { youtubeTitle: "t", youtubeDescription: "d", tiktokDescription: "d", hashtags: [] };
const media = { id: "m", path: "/out/m.mp4" };

describe("buildChannels", () => {
  it("should keep configuration order and skip disabled channels", () => {
    const publisher = new ScriptedPublisher();
    const channels = buildChannels(
      [makeSecondary("tt_1"), makePrimary("yt_1"), makePrimary("yt_off", { enabled: false }), makePrimary("yt_2")],
      { primary: publisher, secondary: publisher }
    );

    expect(channels.map((channel) => [channel.id, channel.kind])).toEqual([
      ["tt_1", "secondary"],
      ["yt_1", "primary"],
      ["yt_2", "primary"]
    ]);
    expect(channels[0]).toBeInstanceOf(SecondaryPlatformChannel);
    expect(channels[1]).toBeInstanceOf(PrimaryPlatformChannel);
  });
});

describe("PrimaryPlatformChannel", () => {
  it("should turn a thrown publisher error into a failed result", async () => {
    const publisher = new ScriptedPublisher();
    publisher.respond("yt", Object.assign(new Error("connect ECONNRESET"), { code: "ECONNRESET" }));
    const channel = new PrimaryPlatformChannel(makePrimary("yt"), publisher);

    await expect(channel.publish(media, metadata)).resolves.toEqual({
      success: false,
      errorKind: "NetworkError",
      message: "connect ECONNRESET"
    });
  });

  it("should pass through the publisher result", async () => {
    const publisher = new ScriptedPublisher();
    const channel = new PrimaryPlatformChannel(makePrimary("yt"), publisher);

    await expect(channel.publish(media, metadata)).resolves.toEqual({ success: true, postId: "post-yt" });
  });
});
