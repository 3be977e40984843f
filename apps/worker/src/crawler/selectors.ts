import type { ExtractSpec, Screen } from "./types";

export const LOGIN_PATH = "/login/phone-or-email/email";

export const SEL = {
  login: {
    username: "input[name='username']",
    password: "input[type='password']",
    submit: "button[type='submit']",
    error: '[data-e2e="login-error"], [type="error"]',
    signedIn: '[data-e2e="profile-icon"]',
  },
  publisher: {
    header: '[data-e2e="user-title"]',
    item: '[data-e2e="user-post-item"]',
    latestThumbnail: '[data-e2e="user-post-item"] a',
    removed: '[data-e2e="user-page-error"], [data-e2e="user-banned"]',
  },
  video: {
    detail: '[data-e2e="browse-video-desc"]',
    container: '[data-e2e="browse-video"]',
    creatorVideos: '[data-e2e="browse-creator-videos"]',
    close: '[data-e2e="browse-close"]',
  },
  feed: {
    list: '[data-e2e="creator-feed-list"]',
    item: '[data-e2e="creator-feed-item"]',
  },
  challenge: '#captcha-verify-container-main-page, .captcha-verify-container, [id^="captcha_container"]',
} as const;

/** Element whose presence defines each screen. */
export const SCREEN_MARKER: Record<Screen, string> = {
  PublisherPage: SEL.publisher.header,
  VideoPage: SEL.video.detail,
  VideoPageWithCreatorFeed: SEL.feed.list,
};

/** Markers that interrupt any wait: the screen loaded, just not the one we wanted. */
export const INTERRUPT_MARKERS = [SEL.challenge, SEL.publisher.removed];

export const CHALLENGE_TEXT = [/verify to continue/i, /drag the slider/i, /select 2 objects/i, /認証/];

export const REMOVED_TEXT = [/couldn['’]t find this account/i, /this account was banned/i, /アカウントが見つかりません/];

export const FRONT_FIELDS: ExtractSpec = {
  href: { selector: "a", attr: "href" },
  thumbnail: { selector: "img", attr: "src" },
  alt: { selector: "img", attr: "alt" },
  likes: { selector: '[data-e2e="video-likes"]' },
};

export const BACK_FIELDS: ExtractSpec = {
  thumbnail: { selector: "img", attr: "src" },
  views: { selector: '[data-e2e="video-views"]' },
};

export const HEAVY_FIELDS: ExtractSpec = {
  title: { selector: SEL.video.detail },
  username: { selector: '[data-e2e="browse-username"]' },
  nickname: { selector: '[data-e2e="browser-nickname"] span:first-child' },
  postTime: { selector: '[data-e2e="browser-nickname"] span:last-child' },
  likes: { selector: '[data-e2e="browse-like-count"]' },
  comments: { selector: '[data-e2e="browse-comment-count"]' },
  collects: { selector: '[data-e2e="undefined-count"]' },
  shares: { selector: '[data-e2e="share-count"]' },
  audioHref: { selector: '[data-e2e="browse-music"] a', attr: "href" },
  audioText: { selector: '[data-e2e="browse-music"]' },
};
