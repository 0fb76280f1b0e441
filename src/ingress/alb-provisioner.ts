import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import { StackConfig } from "../stack-config.js";
import type { AlbConfig } from "./alb-config.js";
import type { AlbDetails } from "./alb-details.js";


export class AlbProvisioner
{
    private readonly _name: string;
    private readonly _config: AlbConfig;
    private readonly _healthCheckPath: string;
    private readonly _resourceOptions: Pulumi.CustomResourceOptions;


    public constructor(name: string, config: AlbConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        this._name = name.trim();

        given(config, "config").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                subnetIds: ["object"],
                securityGroupIds: ["object"],
                "healthCheckPath?": "string",
                "autoScalingGroupNames?": ["object"],
                "provider?": "object"
            })
            .ensure(t => t.subnetIds.length >= 2, "at least 2 subnets in different availability zones must be provided")
            .ensure(t => t.securityGroupIds.isNotEmpty, "at least 1 security group must be provided")
            .ensure(t => t.healthCheckPath == null || (t.healthCheckPath.startsWith("/") && t.healthCheckPath.length <= 1024),
                "healthCheckPath must begin with / and be at most 1024 characters");
        this._config = config;
        this._healthCheckPath = config.healthCheckPath ?? "/";

        this._resourceOptions = { provider: config.provider };
    }


    public provision(): AlbDetails
    {
        const albName = `${this._name}-alb`;
        try
        {
            const alb = new aws.lb.LoadBalancer(albName, {
                internal: false,
                loadBalancerType: "application",
                ipAddressType: "ipv4",
                subnets: [...this._config.subnetIds],
                securityGroups: [...this._config.securityGroupIds],
                tags: {
                    ...StackConfig.tags,
                    Name: albName
                }
            }, this._resourceOptions);

            // the target group lives in whichever vpc owns the balancer's subnets
            const vpcId = aws.ec2.getSubnetOutput({
                id: this._config.subnetIds[0]
            }, { provider: this._config.provider }).vpcId;

            const targetGroupName = `${this._name}-tgt-grp`;
            const targetGroup = new aws.lb.TargetGroup(targetGroupName, {
                port: 80,
                protocol: "HTTP",
                targetType: "instance",
                vpcId,
                healthCheck: {
                    path: this._healthCheckPath,
                    protocol: "HTTP"
                },
                tags: {
                    ...StackConfig.tags,
                    Name: targetGroupName
                }
            }, this._resourceOptions);

            const httpListenerName = `${this._name}-http-lnr`;
            const httpListener = new aws.lb.Listener(httpListenerName, {
                loadBalancerArn: alb.arn,
                protocol: "HTTP",
                port: 80,
                defaultActions: [{
                    type: "forward",
                    targetGroupArn: targetGroup.arn
                }],
                tags: {
                    ...StackConfig.tags,
                    Name: httpListenerName
                }
            }, {
                ...this._resourceOptions,
                parent: alb
            });

            this._config.autoScalingGroupNames?.forEach((asgName, index) =>
            {
                new aws.autoscaling.Attachment(`${this._name}-asg-att-${index + 1}`, {
                    autoscalingGroupName: asgName,
                    lbTargetGroupArn: targetGroup.arn
                }, this._resourceOptions);
            });

            StackConfig.logger.logInfo(`Created ALB: ${albName}`);

            return {
                loadBalancerArn: alb.arn,
                dnsName: alb.dnsName,
                targetGroupArn: targetGroup.arn,
                listenerArn: httpListener.arn
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create ALB ${albName}`, e);
            throw e;
        }
    }
}
