/**
 * rollplot.v1.MeasurementService, declared at run time.
 *
 * Wire contract (proto3):
 *   message StreamValuesRequest {}
 *   message ValueFrame { repeated double values = 1; }
 *   service MeasurementService {
 *     rpc StreamValues(StreamValuesRequest) returns (stream ValueFrame);
 *   }
 *
 * Each ValueFrame is one snapshot of every channel, in the order the plot consumes them.
 */
import { MethodKind, ScalarType, proto3 } from '@bufbuild/protobuf';

export const StreamValuesRequest = proto3.makeMessageType('rollplot.v1.StreamValuesRequest', []);

export const ValueFrame = proto3.makeMessageType('rollplot.v1.ValueFrame', [
    { no: 1, name: 'values', kind: 'scalar', T: ScalarType.DOUBLE, repeated: true },
]);

export const MeasurementService = {
    typeName: 'rollplot.v1.MeasurementService',
    methods: {
        streamValues: {
            name: 'StreamValues',
            I: StreamValuesRequest,
            O: ValueFrame,
            kind: MethodKind.ServerStreaming,
        },
    },
} as const;
