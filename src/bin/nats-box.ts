#!/usr/bin/env node
/**
 * nats-box -- publish, subscribe, request or reply over NATS.
 *
 * The mode comes from the name the tool is installed under:
 *   nats-pub [-s server] [-creds file] [-t] <subject> <msg>
 *   nats-sub [-s server] [-creds file] [-t] <subject>
 *   nats-req [-s server] [-creds file] [-t] <subject> <request>
 *   nats-rply [-s server] [-creds file] [-t] [-q queue] <subject> <response>
 */

import { main } from '../cli';

main(process.argv, process.env).then((code) => {
  process.exit(code);
});
