import { Duration, IPropertyInjector, InjectionContext, RemovalPolicy } from "aws-cdk-lib";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as logs from "aws-cdk-lib/aws-logs";
import { NodejsFunction, NodejsFunctionProps } from "aws-cdk-lib/aws-lambda-nodejs";

/**
 * Defaults applied to every NodejsFunction in the app; explicit props win
 */
export class LambdaNodeDefaults implements IPropertyInjector {
  public readonly constructUniqueId = NodejsFunction.PROPERTY_INJECTION_ID;

  public inject(originalProps: NodejsFunctionProps, context: InjectionContext): NodejsFunctionProps {
    return {
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: Duration.minutes(1),
      memorySize: 512,
      logGroup: new logs.LogGroup(context.scope, `${context.id}LogGroup`, {
        retention: logs.RetentionDays.ONE_MONTH,
        removalPolicy: RemovalPolicy.DESTROY,
      }),
      ...originalProps,
      environment: {
        NODE_OPTIONS: "--enable-source-maps",
        ...originalProps.environment,
      },
      bundling: {
        sourceMap: true,
        sourcesContent: false,
        ...originalProps.bundling,
      },
    };
  }
}
