export * from './ffmpeg/filter-compiler.js';
export * from './ffmpeg/runner.js';
export * from './ffmpeg/transcoder.js';
export * from './ffmpeg/probe.js';
export * from './anonymizer.js';
export * from './review-clips.js';
export * from './audio/wav.js';
export * from './audio/clip-loader.js';
export * from './audio/oral-tracks.js';
