import * as Pulumi from "@pulumi/pulumi";
import { describe, expect, it } from "vitest";
import { AlbProvisioner } from "../../src/ingress/alb-provisioner.js";
import { VpcAz } from "../../src/vpc/vpc-az.js";
import { VpcProvisioner } from "../../src/vpc/vpc-provisioner.js";
import { promiseOf, useStackTestContext } from "../helpers/stack-test-context.js";


describe("AlbProvisioner", () =>
{
    const { mocks, logger } = useStackTestContext();

    const lbArn = "arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/web-alb";
    const targetGroupArn = "arn:aws:elasticloadbalancing:us-east-1:123456789012:targetgroup/web-tgt-grp";

    const provisionNetwork = (prefix: string): ReadonlyArray<Pulumi.Output<string>> => new VpcProvisioner(prefix, {
        cidr16Bits: "10.0",
        subnets: [
            { name: `${prefix}-subnet-a`, type: "public", cidrOctet3: 1, az: VpcAz.a },
            { name: `${prefix}-subnet-b`, type: "public", cidrOctet3: 2, az: VpcAz.b }
        ]
    }).provision().subnetIds;

    it("should forward http to a target group in the subnets' vpc", async () =>
    {
        const subnetIds = provisionNetwork("web");
        logger.clear();

        const details = new AlbProvisioner("web", {
            subnetIds,
            securityGroupIds: [Pulumi.output("sg-web")],
            autoScalingGroupNames: [Pulumi.output("web-asg")]
        }).provision();

        expect(logger.lines).toEqual(["INFO Created ALB: web-alb"]);
        expect(await promiseOf(details.loadBalancerArn)).toBe(lbArn);
        expect(await promiseOf(details.dnsName)).toBe("web-alb.elb.test");
        expect(await promiseOf(details.targetGroupArn)).toBe(targetGroupArn);

        const lb = await mocks.waitFor("aws:lb/loadBalancer:LoadBalancer", "web-alb");
        expect(lb.inputs).toMatchObject({
            internal: false,
            loadBalancerType: "application",
            ipAddressType: "ipv4",
            subnets: ["web-subnet-a-id", "web-subnet-b-id"],
            securityGroups: ["sg-web"]
        });

        const targetGroup = await mocks.waitFor("aws:lb/targetGroup:TargetGroup", "web-tgt-grp");
        expect(targetGroup.inputs).toMatchObject({
            port: 80,
            protocol: "HTTP",
            targetType: "instance",
            vpcId: "web-vpc-id",
            healthCheck: { path: "/", protocol: "HTTP" }
        });

        const listener = await mocks.waitFor("aws:lb/listener:Listener", "web-http-lnr");
        expect(listener.inputs).toMatchObject({
            loadBalancerArn: lbArn,
            protocol: "HTTP",
            port: 80,
            defaultActions: [{ type: "forward", targetGroupArn }]
        });

        const attachment = await mocks.waitFor("aws:autoscaling/attachment:Attachment", "web-asg-att-1");
        expect(attachment.inputs).toMatchObject({
            autoscalingGroupName: "web-asg",
            lbTargetGroupArn: targetGroupArn
        });

        const subnetLookups = mocks.calls.filter(t => t.token === "aws:ec2/getSubnet:getSubnet");
        expect(subnetLookups.map(t => t.inputs.id)).toEqual(["web-subnet-a-id"]);
    });

    it("should use the given health check path", async () =>
    {
        new AlbProvisioner("api", {
            subnetIds: provisionNetwork("api"),
            securityGroupIds: [Pulumi.output("sg-web")],
            healthCheckPath: "/healthz"
        }).provision();

        const targetGroup = await mocks.waitFor("aws:lb/targetGroup:TargetGroup", "api-tgt-grp");
        expect(targetGroup.inputs.healthCheck).toMatchObject({ path: "/healthz" });

        await mocks.settle();
        expect(mocks.ofType("aws:autoscaling/attachment:Attachment")).toHaveLength(0);
    });

    describe("validation", () =>
    {
        const securityGroupIds = [Pulumi.output("sg-web")];

        it("should reject a single subnet", () =>
        {
            expect(() => new AlbProvisioner("web", {
                subnetIds: [Pulumi.output("subnet-a")],
                securityGroupIds
            })).toThrow();
        });

        it("should reject a health check path without a leading slash", () =>
        {
            expect(() => new AlbProvisioner("web", {
                subnetIds: [Pulumi.output("subnet-a"), Pulumi.output("subnet-b")],
                securityGroupIds,
                healthCheckPath: "healthz"
            })).toThrow();
        });

        it("should reject a config without security groups", () =>
        {
            expect(() => new AlbProvisioner("web", {
                subnetIds: [Pulumi.output("subnet-a"), Pulumi.output("subnet-b")],
                securityGroupIds: []
            })).toThrow();
        });
    });
});
