import { AdapterRegistration } from "../adapter.registry";
import { redditRegistration } from "./reddit/reddit.adapter";
import { twitterRegistration } from "./twitter/twitter.adapter";

export const BUILTIN_ADAPTERS: AdapterRegistration[] = [
  redditRegistration,
  twitterRegistration,
];
