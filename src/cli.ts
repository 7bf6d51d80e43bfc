#!/usr/bin/env node
/**
 * P2P Handshake — Command Line
 *
 *   p2p-handshake seeds                                 list DNS seeds
 *   p2p-handshake resolve <seedIndex>                   list peers behind a seed
 *   p2p-handshake handshake <host[:port]>               handshake with one peer
 *   p2p-handshake handshake-seed <seedIndex> <peerIndex>
 *   p2p-handshake discover                              first peer that answers
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseHandshakeConfig, type HandshakeConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { HandshakeManager, type Connector } from "./manager.js";
import { describeFailure, type HandshakeOutcome } from "./p2p/handshake.js";
import {
  discoverPeers,
  dnsSeedAt,
  getDnsSeeds,
  parsePeerAddress,
  resolveSeed,
  type DnsResolver,
} from "./p2p/peers.js";
import { formatPeer, getNetworkParams, type LogFn, type PeerAddress } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  resolver?: DnsResolver;
  connect?: Connector;
}

interface GlobalOptions {
  network?: string;
  timeout?: number;
  userAgent?: string;
  verbose?: boolean;
}

// ============================================================================
// Argument parsers
// ============================================================================

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("must be a non-negative integer");
  }
  return Number(value);
}

function parseMillis(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 1) {
    throw new InvalidArgumentError("must be a positive integer (ms)");
  }
  return ms;
}

// ============================================================================
// Program
// ============================================================================

/**
 * Run the CLI against `argv` (user arguments only, no node/script prefix).
 * @returns the process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = 0;

  const program = new Command();
  program
    .name("p2p-handshake")
    .description("Bitcoin P2P version/verack handshake")
    .option("-n, --network <network>", "mainnet | testnet | regtest | signet")
    .option("-t, --timeout <ms>", "deadline for each handshake receive step", parseMillis)
    .option("--user-agent <ua>", "user agent to announce")
    .option("-v, --verbose", "log handshake progress")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  const loadConfig = (): Readonly<HandshakeConfig> => {
    const opts = program.opts<GlobalOptions>();
    return parseHandshakeConfig({
      network: opts.network,
      userAgent: opts.userAgent,
      timeouts: { stepMs: opts.timeout },
    });
  };

  const makeLog = (): LogFn => {
    const verbose = program.opts<GlobalOptions>().verbose === true;
    return (level, msg) => {
      if (level === "info" && !verbose) return;
      io.err(`[${level}] ${msg}`);
    };
  };

  const handshakeWith = async (config: Readonly<HandshakeConfig>, peer: PeerAddress): Promise<void> => {
    const manager = new HandshakeManager(config, { log: makeLog(), connect: io.connect });
    report(peer, await manager.handshake(peer));
  };

  const report = (peer: PeerAddress, outcome: HandshakeOutcome): void => {
    if (outcome.status === "success") {
      io.out(
        `handshake completed with ${formatPeer(peer)}: negotiated version ${outcome.negotiatedVersion} ` +
          `(remote ${outcome.remoteVersion}, ${outcome.remoteUserAgent || "no user agent"})`,
      );
    } else {
      io.err(`${formatPeer(peer)}: ${describeFailure(outcome)}`);
      exitCode = 1;
    }
  };

  const seedOrFail = (config: Readonly<HandshakeConfig>, index: number): string | undefined => {
    const seed = dnsSeedAt(config.network, index);
    if (seed === undefined) {
      io.err(`no DNS seed at index ${index} for ${config.network}`);
      exitCode = 1;
    }
    return seed;
  };

  // --- seeds ---
  program
    .command("seeds")
    .description("List the DNS seeds of the network")
    .action(() => {
      const config = loadConfig();
      getDnsSeeds(config.network).forEach((seed, i) => io.out(`${i}: ${seed}`));
    });

  // --- resolve <seedIndex> ---
  program
    .command("resolve")
    .description("Resolve a DNS seed into peer addresses")
    .argument("<seedIndex>", "index from `seeds`", parseIndex)
    .action(async (seedIndex: number) => {
      const config = loadConfig();
      const seed = seedOrFail(config, seedIndex);
      if (seed === undefined) return;

      const { defaultPort } = getNetworkParams(config.network);
      const peers = await resolveSeed(seed, defaultPort, io.resolver, makeLog());
      peers.forEach((peer, i) => io.out(`${i}: ${formatPeer(peer)}`));
    });

  // --- handshake <address> ---
  program
    .command("handshake")
    .description("Perform the handshake with one peer")
    .argument("<address>", "host, host:port or [ipv6]:port")
    .action(async (address: string) => {
      const config = loadConfig();
      const peer = parsePeerAddress(address, getNetworkParams(config.network).defaultPort);
      await handshakeWith(config, peer);
    });

  // --- handshake-seed <seedIndex> <peerIndex> ---
  program
    .command("handshake-seed")
    .description("Perform the handshake with a peer picked by seed and peer index")
    .argument("<seedIndex>", "index from `seeds`", parseIndex)
    .argument("<peerIndex>", "index from `resolve <seedIndex>`", parseIndex)
    .action(async (seedIndex: number, peerIndex: number) => {
      const config = loadConfig();
      const seed = seedOrFail(config, seedIndex);
      if (seed === undefined) return;

      const { defaultPort } = getNetworkParams(config.network);
      const peers = await resolveSeed(seed, defaultPort, io.resolver, makeLog());
      const peer = peers[peerIndex];
      if (peer === undefined) {
        io.err(`${seed} resolved ${peers.length} peers; no peer at index ${peerIndex}`);
        exitCode = 1;
        return;
      }
      await handshakeWith(config, peer);
    });

  // --- discover ---
  program
    .command("discover")
    .description("Query every DNS seed and handshake with the first peer that answers")
    .option("--max-peers <count>", "how many candidates to try", parseIndex, 8)
    .action(async (opts: { maxPeers: number }) => {
      const config = loadConfig();
      const log = makeLog();
      const peers = await discoverPeers(config.network, {
        maxPeers: opts.maxPeers,
        resolver: io.resolver,
        log,
      });
      if (peers.length === 0) {
        io.err(`no peers discovered for ${config.network}`);
        exitCode = 1;
        return;
      }

      const manager = new HandshakeManager(config, { log, connect: io.connect });
      const { success, attempts } = await manager.handshakeFirst(peers);
      if (success) {
        report(success.peer, success.outcome);
      } else {
        for (const { peer, outcome } of attempts) report(peer, outcome);
      }
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    io.err(`error: ${errorMessage(err)}`);
    return 1;
  }
  return exitCode;
}

// ============================================================================
// Entry point
// ============================================================================

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMain()) {
  runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
