/**
 * Rollplot - rolling-window strip charts
 *
 * Public API Export
 */

// === Main API ===
export { PlotEngine, formatReadout } from './api/PlotEngine';
export type { PlotEngineOptions, PlotEngineStats } from './api/PlotEngine';
export { RenderLoop } from './api/RenderLoop';
export type { RenderLoopOptions } from './api/RenderLoop';
export { StripChart } from './charts/StripChart';
export type { StripChartOptions } from './charts/StripChart';
export { isCloseNotifier } from './api/types';
export type {
    BaselineDrawable,
    CloseNotifier,
    Drawable,
    FrameRenderer,
    FrameStatus,
    LineDrawable,
    PhaseLayout,
    PlotFrame,
    PlotLayout,
    RowLayout,
    ScatterDrawable,
    TextDrawable,
    ValuesAccessor,
} from './api/types';

// === Rows & Styles ===
export { AxisRow } from './charts/AxisRow';
export type { AxisRange, AxisRowConfig, BaselineState } from './charts/AxisRow';
export { SeriesBinding } from './charts/SeriesBinding';
export { PhasePanel } from './charts/PhasePanel';
export type { PhasePanelConfig } from './charts/PhasePanel';
export { parseStyle, resolveRowStyle, stylesOf, toSeriesStyle } from './charts/styles';
export type { LineKind, MarkerKind, RowStyle, RowStyleInput, SeriesStyle, StyleInput } from './charts/styles';

// === Core ===
export { RollingBuffer, roll } from './core/RollingBuffer';
export type { Axis, RollTarget } from './core/RollingBuffer';
export { CurrentValuesSlot } from './core/CurrentValuesSlot';
export { Downsampler } from './core/Downsampler';
export type { DownsampleResult } from './core/Downsampler';
export {
    ConfigurationMismatchError,
    IndexOutOfRangeError,
    InvalidConfigurationError,
    RollplotError,
    ValueCountMismatchError,
} from './core/errors';
export type { RollplotErrorCode } from './core/errors';

// === Producers ===
export { SineWaveProducer } from './sources/SineWaveProducer';
export type { SineWaveProducerOptions } from './sources/SineWaveProducer';
export { LineInputProducer, parseValueLine } from './sources/LineInputProducer';
export type { LineInputProducerOptions } from './sources/LineInputProducer';
export { MeasurementStreamProducer } from './sources/MeasurementStreamProducer';
export type { MeasurementStreamProducerOptions } from './sources/MeasurementStreamProducer';
export { MeasurementService, StreamValuesRequest, ValueFrame } from './sources/measurementService';
export { ProducerThread } from './sources/ProducerThread';
export type { ProducerWorkerEvent, ProducerWorkerRequest } from './sources/ProducerThread';
export { ProducerHost } from './worker/ProducerHost';
export { createProducer } from './sources/createProducer';
export type { ProducerConfig } from './sources/createProducer';
export type { ValueProducer, ValueSink } from './sources/types';

// === Terminal Renderer ===
export { TerminalRenderer } from './renderer/TerminalRenderer';
export type { TerminalRendererOptions } from './renderer/TerminalRenderer';
