import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import { StackConfig } from "../../stack-config.js";
import type { FleetConfig } from "./fleet-config.js";
import type { FleetDetails } from "./fleet-details.js";


export class FleetProvisioner
{
    private readonly _name: string;
    private readonly _config: FleetConfig;
    private readonly _resourceOptions: Pulumi.CustomResourceOptions;


    public constructor(name: string, config: FleetConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        this._name = name.trim();

        given(config, "config").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                imageId: "string",
                instanceType: "string",
                securityGroupIds: ["object"],
                subnetIds: ["object"],
                minSize: "number",
                maxSize: "number",
                desiredCapacity: "number",
                "provider?": "object"
            })
            .ensure(t => t.imageId.startsWith("ami-"), "imageId must be an ami id")
            .ensure(t => t.securityGroupIds.isNotEmpty, "at least 1 security group must be provided")
            .ensure(t => t.subnetIds.isNotEmpty, "at least 1 subnet must be provided")
            .ensure(t => [t.minSize, t.maxSize, t.desiredCapacity].every(u => Number.isInteger(u) && u >= 0),
                "minSize, maxSize and desiredCapacity must be non-negative whole numbers");
        this._config = config;

        this._resourceOptions = { provider: config.provider };
    }


    public provision(): FleetDetails
    {
        const launchTemplate = this._provisionLaunchTemplate();

        const asgName = `${this._name}-asg`;
        try
        {
            const asg = new aws.autoscaling.Group(asgName, {
                launchTemplate: {
                    id: launchTemplate.id,
                    version: Pulumi.interpolate`${launchTemplate.latestVersion}`
                },
                minSize: this._config.minSize,
                maxSize: this._config.maxSize,
                desiredCapacity: this._config.desiredCapacity,
                vpcZoneIdentifiers: [...this._config.subnetIds],
                tags: Object.entries({ ...StackConfig.tags, Name: asgName })
                    .map(([key, value]) => ({
                        key,
                        value,
                        propagateAtLaunch: true
                    }))
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created Auto Scaling group: ${asgName}`);

            return {
                launchTemplateId: launchTemplate.id,
                autoScalingGroupName: asg.name
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create Auto Scaling group ${asgName}`, e);
            throw e;
        }
    }

    private _provisionLaunchTemplate(): aws.ec2.LaunchTemplate
    {
        const launchTemplateName = `${this._name}-lt`;
        try
        {
            const launchTemplate = new aws.ec2.LaunchTemplate(launchTemplateName, {
                imageId: this._config.imageId,
                instanceType: this._config.instanceType,
                vpcSecurityGroupIds: [...this._config.securityGroupIds],
                updateDefaultVersion: true,
                tagSpecifications: [{
                    resourceType: "instance",
                    tags: {
                        ...StackConfig.tags,
                        Name: `${this._name}-instance`
                    }
                }],
                tags: {
                    ...StackConfig.tags,
                    Name: launchTemplateName
                }
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created launch template: ${launchTemplateName}`);

            return launchTemplate;
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create launch template ${launchTemplateName}`, e);
            throw e;
        }
    }
}
