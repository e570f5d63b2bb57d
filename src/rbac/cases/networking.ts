/**
 * Networking test cases: the custom role may deploy into the existing topology but never change it
 */

import type { Subnet } from "@azure/arm-network";
import type { AzureClients } from "../../azure/clients.js";
import { parseResourceId } from "../../azure/resourceId.js";
import { SCAFFOLD_NAMES } from "../constants.js";
import type { Requirement, TestCase, TestExecutionContext } from "../types.js";
import { runScopedName, scaffoldId } from "./support.js";

export const NETWORKING_REQUIREMENTS = {
  publicIp: { id: "REQ-07", name: "Public IP exposure" },
  peering: { id: "REQ-08", name: "Virtual network peering" },
  routing: { id: "REQ-09", name: "Routing" },
  addressing: { id: "REQ-10", name: "Subnet and address space" },
  nsg: { id: "REQ-11", name: "Network security groups" },
  natGateway: { id: "REQ-12", name: "NAT gateway" },
  hybrid: { id: "REQ-13", name: "Hybrid connectivity" },
  privateConnectivity: { id: "REQ-14", name: "Private connectivity and storage exposure" },
  workload: { id: "REQ-15", name: "Workload deployment (positive control)" },
} satisfies Record<string, Requirement>;

const R = NETWORKING_REQUIREMENTS;
const N = SCAFFOLD_NAMES;

/**
 * Read a subnet, apply a change and write it back; the cleanup reverts through `revert`
 */
async function modifySubnet(
  context: TestExecutionContext,
  vnetName: string,
  subnetName: string,
  change: (subnet: Subnet) => Subnet,
  revert: { description: string; apply: (subnet: Subnet) => Subnet }
): Promise<void> {
  const { suite, clients } = context;
  const rg = suite.resourceGroup;
  const subnet = await clients.network.subnets.get(rg, vnetName, subnetName);

  await clients.network.subnets.beginCreateOrUpdateAndWait(rg, vnetName, subnetName, change(subnet));

  suite.cleanup.register(revert.description, async (c: AzureClients) => {
    const current = await c.network.subnets.get(rg, vnetName, subnetName);
    await c.network.subnets.beginCreateOrUpdateAndWait(rg, vnetName, subnetName, revert.apply(current));
  });
}

export const NETWORKING_TESTS: TestCase[] = [
  {
    id: "NET-001",
    module: "Networking",
    requirement: R.publicIp,
    name: "Create a public IP address",
    description: "The service principal tries to allocate a new Standard public IP.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "pip");
      await clients.network.publicIPAddresses.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        sku: { name: "Standard" },
        publicIPAllocationMethod: "Static",
      });
      suite.cleanup.register(`Delete public IP ${name}`, c =>
        c.network.publicIPAddresses.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-002",
    module: "Networking",
    requirement: R.publicIp,
    name: "Associate an existing public IP with a network interface",
    description: "The service principal may update NICs but must not join a public IP to one.",
    expectation: "deny",
    requires: ["nicId", "publicIpId"],
    execute: async context => {
      const { suite, clients } = context;
      const rg = suite.resourceGroup;
      const nic = await clients.network.networkInterfaces.get(rg, N.nic);
      const publicIpId = scaffoldId(context, "publicIpId");

      await clients.network.networkInterfaces.beginCreateOrUpdateAndWait(rg, N.nic, {
        ...nic,
        ipConfigurations: (nic.ipConfigurations ?? []).map((config, index) =>
          index === 0 ? { ...config, publicIPAddress: { id: publicIpId } } : config
        ),
      });

      suite.cleanup.register(`Detach public IP from ${N.nic}`, async c => {
        const current = await c.network.networkInterfaces.get(rg, N.nic);
        await c.network.networkInterfaces.beginCreateOrUpdateAndWait(rg, N.nic, {
          ...current,
          ipConfigurations: (current.ipConfigurations ?? []).map(config => ({ ...config, publicIPAddress: undefined })),
        });
      });
    },
  },
  {
    id: "NET-003",
    module: "Networking",
    requirement: R.publicIp,
    name: "Create a public IP prefix",
    description: "The service principal tries to reserve a /31 public IP prefix.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "ippre");
      await clients.network.publicIPPrefixes.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        sku: { name: "Standard" },
        prefixLength: 31,
      });
      suite.cleanup.register(`Delete public IP prefix ${name}`, c =>
        c.network.publicIPPrefixes.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-004",
    module: "Networking",
    requirement: R.peering,
    name: "Peer hub to spoke",
    description: "The service principal tries to create a peering from the hub network to the spoke network.",
    expectation: "deny",
    requires: ["hubVnetId", "spokeVnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "peer-hub-spoke");
      await clients.network.virtualNetworkPeerings.beginCreateOrUpdateAndWait(suite.resourceGroup, N.hubVnet, name, {
        remoteVirtualNetwork: { id: scaffoldId(context, "spokeVnetId") },
        allowVirtualNetworkAccess: true,
        allowForwardedTraffic: true,
      });
      suite.cleanup.register(`Delete peering ${name}`, c =>
        c.network.virtualNetworkPeerings.beginDeleteAndWait(suite.resourceGroup, N.hubVnet, name)
      );
    },
  },
  {
    id: "NET-005",
    module: "Networking",
    requirement: R.peering,
    name: "Peer spoke to hub",
    description: "The service principal tries to create the return peering from spoke to hub.",
    expectation: "deny",
    requires: ["hubVnetId", "spokeVnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "peer-spoke-hub");
      await clients.network.virtualNetworkPeerings.beginCreateOrUpdateAndWait(suite.resourceGroup, N.spokeVnet, name, {
        remoteVirtualNetwork: { id: scaffoldId(context, "hubVnetId") },
        allowVirtualNetworkAccess: true,
      });
      suite.cleanup.register(`Delete peering ${name}`, c =>
        c.network.virtualNetworkPeerings.beginDeleteAndWait(suite.resourceGroup, N.spokeVnet, name)
      );
    },
  },
  {
    id: "NET-006",
    module: "Networking",
    requirement: R.routing,
    name: "Create a route table",
    description: "The service principal tries to create a new route table.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "rt");
      await clients.network.routeTables.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
      });
      suite.cleanup.register(`Delete route table ${name}`, c =>
        c.network.routeTables.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-007",
    module: "Networking",
    requirement: R.routing,
    name: "Add a default route to the Internet",
    description: "The service principal tries to add 0.0.0.0/0 -> Internet to the existing route table.",
    expectation: "deny",
    requires: ["routeTableId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "route-default");
      await clients.network.routes.beginCreateOrUpdateAndWait(suite.resourceGroup, N.routeTable, name, {
        addressPrefix: "0.0.0.0/0",
        nextHopType: "Internet",
      });
      suite.cleanup.register(`Delete route ${name}`, c =>
        c.network.routes.beginDeleteAndWait(suite.resourceGroup, N.routeTable, name)
      );
    },
  },
  {
    id: "NET-008",
    module: "Networking",
    requirement: R.routing,
    name: "Associate a route table with a subnet",
    description: "The service principal tries to attach the existing route table to the hub workload subnet.",
    expectation: "deny",
    requires: ["routeTableId", "hubSubnetId"],
    execute: async context => {
      const routeTableId = scaffoldId(context, "routeTableId");
      await modifySubnet(
        context,
        N.hubVnet,
        N.workloadSubnet,
        subnet => ({ ...subnet, routeTable: { id: routeTableId } }),
        {
          description: `Detach route table from ${N.hubVnet}/${N.workloadSubnet}`,
          apply: subnet => ({ ...subnet, routeTable: undefined }),
        }
      );
    },
  },
  {
    id: "NET-009",
    module: "Networking",
    requirement: R.addressing,
    name: "Create a subnet",
    description: "The service principal tries to carve a new subnet out of the hub address space.",
    expectation: "deny",
    requires: ["hubVnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "snet");
      await clients.network.subnets.beginCreateOrUpdateAndWait(suite.resourceGroup, N.hubVnet, name, {
        addressPrefix: "10.10.2.0/24",
      });
      suite.cleanup.register(`Delete subnet ${N.hubVnet}/${name}`, c =>
        c.network.subnets.beginDeleteAndWait(suite.resourceGroup, N.hubVnet, name)
      );
    },
  },
  {
    id: "NET-010",
    module: "Networking",
    requirement: R.addressing,
    name: "Delete a subnet",
    description: "The service principal tries to delete the spoke workload subnet.",
    expectation: "deny",
    requires: ["spokeSubnetId"],
    execute: async context => {
      await context.clients.network.subnets.beginDeleteAndWait(context.suite.resourceGroup, N.spokeVnet, N.workloadSubnet);
    },
  },
  {
    id: "NET-011",
    module: "Networking",
    requirement: R.addressing,
    name: "Extend a virtual network address space",
    description: "The service principal tries to add 10.11.0.0/16 to the hub network.",
    expectation: "deny",
    requires: ["hubVnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const rg = suite.resourceGroup;
      const vnet = await clients.network.virtualNetworks.get(rg, N.hubVnet);
      const originalPrefixes = vnet.addressSpace?.addressPrefixes ?? [];

      await clients.network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.hubVnet, {
        ...vnet,
        addressSpace: { addressPrefixes: [...originalPrefixes, "10.11.0.0/16"] },
      });

      suite.cleanup.register(`Restore address space of ${N.hubVnet}`, async c => {
        const current = await c.network.virtualNetworks.get(rg, N.hubVnet);
        await c.network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.hubVnet, {
          ...current,
          addressSpace: { addressPrefixes: originalPrefixes },
        });
      });
    },
  },
  {
    id: "NET-012",
    module: "Networking",
    requirement: R.addressing,
    name: "Change virtual network DNS servers",
    description: "The service principal tries to point the hub network at a custom DNS server.",
    expectation: "deny",
    requires: ["hubVnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const rg = suite.resourceGroup;
      const vnet = await clients.network.virtualNetworks.get(rg, N.hubVnet);
      const originalDhcpOptions = vnet.dhcpOptions;

      await clients.network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.hubVnet, {
        ...vnet,
        dhcpOptions: { dnsServers: ["10.10.1.4"] },
      });

      suite.cleanup.register(`Restore DNS servers of ${N.hubVnet}`, async c => {
        const current = await c.network.virtualNetworks.get(rg, N.hubVnet);
        await c.network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.hubVnet, {
          ...current,
          dhcpOptions: originalDhcpOptions ?? { dnsServers: [] },
        });
      });
    },
  },
  {
    id: "NET-013",
    module: "Networking",
    requirement: R.nsg,
    name: "Add an allow-all inbound security rule",
    description: "The service principal tries to open every port from any source on the workload NSG.",
    expectation: "deny",
    requires: ["nsgId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "allow-any-inbound");
      await clients.network.securityRules.beginCreateOrUpdateAndWait(suite.resourceGroup, N.nsg, name, {
        priority: 100,
        direction: "Inbound",
        access: "Allow",
        protocol: "*",
        sourceAddressPrefix: "*",
        sourcePortRange: "*",
        destinationAddressPrefix: "*",
        destinationPortRange: "*",
      });
      suite.cleanup.register(`Delete security rule ${name}`, c =>
        c.network.securityRules.beginDeleteAndWait(suite.resourceGroup, N.nsg, name)
      );
    },
  },
  {
    id: "NET-014",
    module: "Networking",
    requirement: R.nsg,
    name: "Delete a network security group",
    description: "The service principal tries to delete the workload NSG.",
    expectation: "deny",
    requires: ["nsgId"],
    execute: async context => {
      await context.clients.network.networkSecurityGroups.beginDeleteAndWait(context.suite.resourceGroup, N.nsg);
    },
  },
  {
    id: "NET-015",
    module: "Networking",
    requirement: R.nsg,
    name: "Dissociate an NSG from its subnet",
    description: "The service principal tries to detach the NSG protecting the hub workload subnet.",
    expectation: "deny",
    requires: ["nsgId", "hubSubnetId"],
    execute: async context => {
      const nsgId = scaffoldId(context, "nsgId");
      await modifySubnet(
        context,
        N.hubVnet,
        N.workloadSubnet,
        subnet => ({ ...subnet, networkSecurityGroup: undefined }),
        {
          description: `Reattach ${N.nsg} to ${N.hubVnet}/${N.workloadSubnet}`,
          apply: subnet => ({ ...subnet, networkSecurityGroup: { id: nsgId } }),
        }
      );
    },
  },
  {
    id: "NET-016",
    module: "Networking",
    requirement: R.natGateway,
    name: "Create a NAT gateway",
    description: "The service principal tries to create a new NAT gateway.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "natgw");
      await clients.network.natGateways.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        sku: { name: "Standard" },
      });
      suite.cleanup.register(`Delete NAT gateway ${name}`, c =>
        c.network.natGateways.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-017",
    module: "Networking",
    requirement: R.natGateway,
    name: "Associate a NAT gateway with a subnet",
    description: "The service principal tries to route the hub workload subnet's egress through the existing NAT gateway.",
    expectation: "deny",
    requires: ["natGatewayId", "hubSubnetId"],
    execute: async context => {
      const natGatewayId = scaffoldId(context, "natGatewayId");
      await modifySubnet(
        context,
        N.hubVnet,
        N.workloadSubnet,
        subnet => ({ ...subnet, natGateway: { id: natGatewayId } }),
        {
          description: `Detach NAT gateway from ${N.hubVnet}/${N.workloadSubnet}`,
          apply: subnet => ({ ...subnet, natGateway: undefined }),
        }
      );
    },
  },
  {
    id: "NET-018",
    module: "Networking",
    requirement: R.hybrid,
    name: "Create a local network gateway",
    description: "The service principal tries to define an on-premises site for a VPN connection.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "lgw");
      await clients.network.localNetworkGateways.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        gatewayIpAddress: "203.0.113.10",
        localNetworkAddressSpace: { addressPrefixes: ["192.168.100.0/24"] },
      });
      suite.cleanup.register(`Delete local network gateway ${name}`, c =>
        c.network.localNetworkGateways.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-019",
    module: "Networking",
    requirement: R.hybrid,
    name: "Create a virtual network gateway",
    description: "The service principal tries to deploy a VPN gateway into the hub GatewaySubnet.",
    expectation: "deny",
    requires: ["gatewaySubnetId", "publicIpId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "vgw");
      // Only the initial request is awaited: a gateway takes far longer to provision than a test run
      await clients.network.virtualNetworkGateways.beginCreateOrUpdate(suite.resourceGroup, name, {
        location: suite.region,
        gatewayType: "Vpn",
        vpnType: "RouteBased",
        sku: { name: "VpnGw1", tier: "VpnGw1" },
        ipConfigurations: [
          {
            name: "default",
            subnet: { id: scaffoldId(context, "gatewaySubnetId") },
            publicIPAddress: { id: scaffoldId(context, "publicIpId") },
          },
        ],
      });
      suite.cleanup.register(`Delete virtual network gateway ${name}`, c =>
        c.network.virtualNetworkGateways.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-020",
    module: "Networking",
    requirement: R.privateConnectivity,
    name: "Create a private endpoint",
    description: "The service principal tries to expose the storage account's blob service into the hub network.",
    expectation: "deny",
    requires: ["storageAccountId", "hubSubnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "pe");
      await clients.network.privateEndpoints.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        subnet: { id: scaffoldId(context, "hubSubnetId") },
        privateLinkServiceConnections: [
          {
            name: `${name}-blob`,
            privateLinkServiceId: scaffoldId(context, "storageAccountId"),
            groupIds: ["blob"],
          },
        ],
      });
      suite.cleanup.register(`Delete private endpoint ${name}`, c =>
        c.network.privateEndpoints.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-021",
    module: "Networking",
    requirement: R.privateConnectivity,
    name: "Enable public network access on a storage account",
    description: "The service principal tries to flip the storage account from private to public network access.",
    expectation: "deny",
    requires: ["storageAccountId"],
    execute: async context => {
      const { suite, clients } = context;
      const accountName = parseResourceId(scaffoldId(context, "storageAccountId")).name ?? suite.storageAccountName;
      await clients.storage.storageAccounts.update(suite.resourceGroup, accountName, {
        publicNetworkAccess: "Enabled",
      });
      suite.cleanup.register(`Disable public network access on ${accountName}`, c =>
        c.storage.storageAccounts.update(suite.resourceGroup, accountName, { publicNetworkAccess: "Disabled" })
      );
    },
  },
  {
    id: "NET-022",
    module: "Networking",
    requirement: R.privateConnectivity,
    name: "Add a service endpoint to a subnet",
    description: "The service principal tries to enable the Microsoft.Storage service endpoint on the hub workload subnet.",
    expectation: "deny",
    requires: ["hubSubnetId"],
    execute: async context => {
      let originalEndpoints: Subnet["serviceEndpoints"];
      await modifySubnet(
        context,
        N.hubVnet,
        N.workloadSubnet,
        subnet => {
          originalEndpoints = subnet.serviceEndpoints;
          return { ...subnet, serviceEndpoints: [...(subnet.serviceEndpoints ?? []), { service: "Microsoft.Storage" }] };
        },
        {
          description: `Remove service endpoint from ${N.hubVnet}/${N.workloadSubnet}`,
          apply: subnet => ({ ...subnet, serviceEndpoints: originalEndpoints ?? [] }),
        }
      );
    },
  },
  {
    id: "NET-023",
    module: "Networking",
    requirement: R.workload,
    name: "Create a network interface in an existing subnet",
    description: "Positive control: deploying a NIC into the hub workload subnet is what the role is for.",
    expectation: "allow",
    requires: ["hubSubnetId"],
    execute: async context => {
      const { suite, clients } = context;
      const name = runScopedName(context, "nic");
      await clients.network.networkInterfaces.beginCreateOrUpdateAndWait(suite.resourceGroup, name, {
        location: suite.region,
        ipConfigurations: [{ name: "ipconfig1", subnet: { id: scaffoldId(context, "hubSubnetId") } }],
      });
      suite.cleanup.register(`Delete network interface ${name}`, c =>
        c.network.networkInterfaces.beginDeleteAndWait(suite.resourceGroup, name)
      );
    },
  },
  {
    id: "NET-024",
    module: "Networking",
    requirement: R.workload,
    name: "List virtual networks",
    description: "Positive control: reading the network topology is covered by */read.",
    expectation: "allow",
    requires: ["resourceGroupId"],
    execute: async context => {
      for await (const _vnet of context.clients.network.virtualNetworks.list(context.suite.resourceGroup)) {
        // draining the pager is the operation under test
      }
    },
  },
];
