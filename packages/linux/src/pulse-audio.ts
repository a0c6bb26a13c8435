/**
 * PulseAudio / PipeWire-Pulse virtual microphone
 *
 * The mirror process plays the phone's microphone into a null sink; a remap
 * source on the sink's monitor is what applications select as a microphone.
 */

import {
  AllocatedResource,
  AudioProvisioner,
  BaseProvisioner,
  CommandRunner,
  ProvisioningError,
  SessionConfiguration,
  ValidationError,
} from '@adbcam/core';
import { linuxConfig } from './config';

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface PulseAudioOptions {
  sinkName: string;
  pactl: string;
}

const defaultOptions: PulseAudioOptions = {
  sinkName: linuxConfig.sinkName,
  pactl: linuxConfig.pactlBin,
};

/**
 * pactl load-module prints the new module's index
 */
export function parseModuleIndex(output: string): string | null {
  const value = output.trim();
  return /^\d+$/.test(value) ? value : null;
}

/**
 * Names from `pactl list short sinks` (second tab-separated column)
 */
export function parseSinkNames(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.split('\t')[1]?.trim())
    .filter((name): name is string => Boolean(name));
}

export function microphoneName(sinkName: string): string {
  return `${sinkName}_mic`;
}

export class PulseAudioProvisioner extends BaseProvisioner implements AudioProvisioner {
  private readonly options: PulseAudioOptions;

  constructor(runner: CommandRunner, options: Partial<PulseAudioOptions> = {}) {
    super('PulseAudio', runner);
    this.options = { ...defaultOptions, ...options };
    if (!NAME_PATTERN.test(this.options.sinkName)) {
      throw new ValidationError(`Invalid audio sink name: ${this.options.sinkName}`);
    }
  }

  async listSinks(): Promise<string[]> {
    const { stdout } = await this.runOrFail(
      this.options.pactl,
      ['list', 'short', 'sinks'],
      'Cannot reach the audio server'
    );
    return parseSinkNames(stdout);
  }

  async createSink(config: SessionConfiguration): Promise<AllocatedResource> {
    const { sinkName } = this.options;

    const sinks = await this.listSinks();
    if (sinks.includes(sinkName)) {
      throw new ProvisioningError(
        `An audio sink named ${sinkName} already exists. Is another session running?`,
        { sinkName }
      );
    }

    console.log(`[${this.name}] Creating sink ${sinkName} for ${config.audioSource}`);

    const moduleIndex = await this.loadModule(
      [
        'module-null-sink',
        `sink_name=${sinkName}`,
        `sink_properties=device.description=${sinkName}`,
      ],
      `Failed to create audio sink ${sinkName}`
    );

    return {
      kind: 'virtual_audio_sink',
      handle: moduleIndex,
      target: sinkName,
      label: `sink ${sinkName} (module ${moduleIndex})`,
      release: () => this.unloadModule(moduleIndex),
    };
  }

  async createLoopback(
    _config: SessionConfiguration,
    sink: AllocatedResource
  ): Promise<AllocatedResource> {
    const sourceName = microphoneName(sink.target);

    console.log(`[${this.name}] Exposing ${sink.target} as microphone ${sourceName}`);

    const moduleIndex = await this.loadModule(
      [
        'module-remap-source',
        `master=${sink.target}.monitor`,
        `source_name=${sourceName}`,
        `source_properties=device.description=${sourceName}`,
      ],
      `Failed to create microphone ${sourceName}`
    );

    return {
      kind: 'virtual_audio_loopback',
      handle: moduleIndex,
      target: sourceName,
      label: `microphone ${sourceName} (module ${moduleIndex})`,
      release: () => this.unloadModule(moduleIndex),
    };
  }

  async unloadModule(moduleIndex: string): Promise<void> {
    await this.runRelease(this.options.pactl, ['unload-module', moduleIndex]);
  }

  private async loadModule(args: string[], failure: string): Promise<string> {
    const { stdout } = await this.runOrFail(this.options.pactl, ['load-module', ...args], failure);
    const moduleIndex = parseModuleIndex(stdout);
    if (!moduleIndex) {
      throw new ProvisioningError(`${failure}: unexpected pactl output "${stdout.trim()}"`);
    }
    return moduleIndex;
  }
}
